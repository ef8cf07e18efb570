// CloudWatch custom metrics

import { CloudWatchClient, PutMetricDataCommand, StandardUnit } from '@aws-sdk/client-cloudwatch';
import { Logger, describeError } from './logger';

export type MetricDimensions = Record<string, string>;

export interface MetricsPublisher {
  count(metricName: string, dimensions?: MetricDimensions): Promise<void>;
  duration(metricName: string, milliseconds: number, dimensions?: MetricDimensions): Promise<void>;
}

/**
 * Publishes one datum per call. Publishing errors are logged and never fail
 * the caller.
 */
export class CloudWatchMetrics implements MetricsPublisher {
  constructor(
    private readonly client: Pick<CloudWatchClient, 'send'>,
    private readonly namespace: string,
    private readonly logger: Logger
  ) {}

  count(metricName: string, dimensions?: MetricDimensions): Promise<void> {
    return this.put(metricName, 1, StandardUnit.Count, dimensions);
  }

  duration(metricName: string, milliseconds: number, dimensions?: MetricDimensions): Promise<void> {
    return this.put(metricName, milliseconds, StandardUnit.Milliseconds, dimensions);
  }

  private async put(
    metricName: string,
    value: number,
    unit: StandardUnit,
    dimensions?: MetricDimensions
  ): Promise<void> {
    const command = new PutMetricDataCommand({
      Namespace: this.namespace,
      MetricData: [
        {
          MetricName: metricName,
          Value: value,
          Unit: unit,
          Timestamp: new Date(),
          Dimensions: dimensions
            ? Object.entries(dimensions).map(([Name, Value]) => ({ Name, Value }))
            : undefined,
        },
      ],
    });

    try {
      await this.client.send(command);
    } catch (error) {
      this.logger.error('Failed to publish metric', { metricName, ...describeError(error) });
    }
  }
}
