/**
 * Routes API Gateway requests to ingestion and the video lookups.
 *
 * The route is the last path segment, so stage prefixes such as
 * `/dev/latestvideo` resolve the same as `/latestvideo`.
 */

import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { MethodNotAllowedError, RouteNotFoundError, ValidationError } from '../utils/errors';
import { ERROR_MESSAGE_404, jsonResponse, optionsResponse, toErrorResponse } from '../utils/http';
import { Logger } from '../utils/logger';
import { MetricsPublisher } from '../utils/metrics';
import { ERROR_MISSING_BODY } from '../utils/validation';
import { IngestionService } from './ingestion';
import { EventVideoFinder, LatestVideoFinder } from './video-finder';

export const ROUTE_ALARM = 'alarmevent';
export const ROUTE_LATEST_VIDEO = 'latestvideo';

export const ERROR_INVALID_ROUTE = 'please provide a valid route';

const DISALLOWED_METHODS = new Set(['PUT', 'PATCH', 'HEAD', 'DELETE']);

export type HttpRequest = Pick<APIGatewayProxyEvent, 'httpMethod' | 'path' | 'body' | 'queryStringParameters'>;

export interface RouteInfo {
  method: string;
  route: string;
}

export function extractRoute(event: Pick<HttpRequest, 'httpMethod' | 'path'>): RouteInfo {
  const segments = event.path.split('/').filter((segment) => segment.length > 0);
  return {
    method: event.httpMethod.toUpperCase(),
    route: segments.length > 0 ? segments[segments.length - 1].toLowerCase() : '',
  };
}

/**
 * Lazily resolved collaborators. Each route only builds what it uses, so a
 * missing queue setting does not break the lookups and vice versa.
 */
export interface RouterDependencies {
  ingestion: () => IngestionService;
  latestVideoFinder: () => LatestVideoFinder;
  eventVideoFinder: () => EventVideoFinder;
  metrics: MetricsPublisher;
  logger: Logger;
}

export class RequestRouter {
  constructor(private readonly deps: RouterDependencies) {}

  async route(event: HttpRequest): Promise<APIGatewayProxyResult> {
    const { method, route } = extractRoute(event);
    const logger = this.deps.logger;
    logger.info('Routing request', { method, path: event.path, route });

    if (method === 'OPTIONS') {
      return optionsResponse();
    }

    try {
      return await this.dispatch(event, method, route);
    } catch (error) {
      return toErrorResponse(error, logger);
    }
  }

  private async dispatch(event: HttpRequest, method: string, route: string): Promise<APIGatewayProxyResult> {
    const hasQuery = Object.keys(event.queryStringParameters ?? {}).length > 0;
    if (route === '' && !hasQuery) {
      throw new RouteNotFoundError(ERROR_MESSAGE_404 + ERROR_INVALID_ROUTE);
    }

    if (method === 'POST' && route === ROUTE_ALARM) {
      return this.handleAlarmWebhook(event.body);
    }

    if (method === 'GET' && route === ROUTE_LATEST_VIDEO) {
      return this.timedQuery('latest', () => this.deps.latestVideoFinder().findLatest());
    }

    if (method === 'GET') {
      const eventId = event.queryStringParameters?.eventId?.trim();
      if (!eventId) {
        throw new ValidationError('InvalidPayload', "Missing required parameter. Provide 'eventId' for video download.");
      }
      return this.timedQuery('event', () => this.deps.eventVideoFinder().findByEventId(eventId));
    }

    if (DISALLOWED_METHODS.has(method)) {
      throw new MethodNotAllowedError(`Method ${method} is not allowed for this endpoint.`);
    }

    throw new RouteNotFoundError(`${ERROR_MESSAGE_404}${ERROR_INVALID_ROUTE}. Route: ${route}, Method: ${method}`);
  }

  private async handleAlarmWebhook(body: string | null): Promise<APIGatewayProxyResult> {
    if (!body) {
      throw new ValidationError('MissingBody', ERROR_MISSING_BODY);
    }

    let envelope: unknown;
    try {
      envelope = JSON.parse(body);
    } catch {
      throw new ValidationError('InvalidPayload', 'Invalid alarm object format');
    }

    const ack = await this.deps.ingestion().ingest(envelope);
    return jsonResponse(200, ack);
  }

  private async timedQuery(query: string, run: () => Promise<unknown>): Promise<APIGatewayProxyResult> {
    const startTime = Date.now();
    try {
      return jsonResponse(200, await run());
    } finally {
      await this.deps.metrics.duration('QueryDuration', Date.now() - startTime, { Query: query });
    }
  }
}
