/**
 * Receiver Lambda Function
 *
 * One function serves three invocation sources:
 * - API Gateway: alarm webhook, video lookups, CORS preflight
 * - SQS delay queue: delayed processing of queued alarms
 * - EventBridge schedule: keep-alive ping, no work done
 */

import { APIGatewayProxyResult, Context, SQSBatchResponse } from 'aws-lambda';
import { loadConfig } from '../../config/config';
import { classifyInvocation } from '../../services/event-classifier';
import { InvocationServices, ServiceContainer, createAwsClients } from '../../services/container';
import { errorResponse, jsonResponse, toErrorResponse } from '../../utils/http';
import { Logger } from '../../utils/logger';

export type ReceiverResult = APIGatewayProxyResult | SQSBatchResponse;

export type ServicesFactory = (logger: Logger) => InvocationServices;

export type InvocationContext = Pick<Context, 'functionName' | 'awsRequestId'>;

export const NO_ACTION_MESSAGE = 'No action taken on request.';
export const UNRECOGNIZED_MESSAGE = 'Unrecognized invocation: expected an API Gateway request, SQS batch or scheduled event';

export function createHandler(servicesFor: ServicesFactory, baseLogger: Logger = new Logger()) {
  return async (event: unknown, context: InvocationContext): Promise<ReceiverResult> => {
    const logger = baseLogger.child({ functionName: context.functionName, requestId: context.awsRequestId });
    const invocation = classifyInvocation(event);
    logger.info('Received invocation', { kind: invocation.kind });

    switch (invocation.kind) {
      case 'ScheduledPing':
        return jsonResponse(200, { msg: NO_ACTION_MESSAGE });

      case 'QueueBatch': {
        // A configuration error here fails the whole batch, which SQS retries
        const response = await servicesFor(logger).processor().processBatch(invocation.event);
        logger.info('Processed queue batch', {
          records: invocation.event.Records.length,
          failures: response.batchItemFailures.length,
        });
        return response;
      }

      case 'HttpRequest': {
        let services: InvocationServices;
        try {
          services = servicesFor(logger);
        } catch (error) {
          return toErrorResponse(error, logger);
        }
        return services.router.route(invocation.event);
      }

      case 'Unrecognized':
        logger.warn('Unrecognized invocation');
        return errorResponse(400, UNRECOGNIZED_MESSAGE);
    }
  };
}

let container: ServiceContainer | undefined;

function defaultServices(logger: Logger): InvocationServices {
  if (!container) {
    const config = loadConfig();
    container = new ServiceContainer(config, createAwsClients(), new Logger({ functionName: config.functionName }));
  }
  return container.forInvocation(logger);
}

export const handler = createHandler(defaultServices);
