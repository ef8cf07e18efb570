import * as cdk from 'aws-cdk-lib';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import * as nodejs from 'aws-cdk-lib/aws-lambda-nodejs';
import * as eventsources from 'aws-cdk-lib/aws-lambda-event-sources';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as s3 from 'aws-cdk-lib/aws-s3';
import * as sqs from 'aws-cdk-lib/aws-sqs';
import * as events from 'aws-cdk-lib/aws-events';
import * as targets from 'aws-cdk-lib/aws-events-targets';
import * as secretsmanager from 'aws-cdk-lib/aws-secretsmanager';
import * as apigateway from 'aws-cdk-lib/aws-apigateway';
import * as cloudwatch from 'aws-cdk-lib/aws-cloudwatch';
import { Construct } from 'constructs';
import * as path from 'path';

const METRICS_NAMESPACE = 'AlarmVideoService';

// Videos and metadata are kept this many days
export const MAX_RETENTION_DAYS = 30;

// Deliveries of one alarm before it is dead-lettered
export const MAX_RECEIVE_COUNT = 3;

export interface AlarmVideoStackProps extends cdk.StackProps {
  // Path of the Chromium binary provided by a layer
  chromiumPath?: string;
  chromiumLayerArn?: string;
  // DEVICE_METADATA JSON
  deviceMetadata?: string;
  timeZone?: string;
}

/**
 * Alarm video pipeline:
 * - S3 bucket of day-partitioned metadata, thumbnails and videos
 * - SQS delay queue with a dead-letter queue
 * - Receiver Lambda behind API Gateway, consuming the queue, kept warm by a schedule
 * - Health Lambda
 * - CloudWatch alarms
 */
export class AlarmVideoStack extends cdk.Stack {
  public readonly storageBucket: s3.Bucket;
  public readonly alarmQueue: sqs.Queue;
  public readonly alarmDLQ: sqs.Queue;
  public readonly credentialsSecret: secretsmanager.Secret;
  public readonly receiverLambda: nodejs.NodejsFunction;
  public readonly healthLambda: nodejs.NodejsFunction;
  public readonly api: apigateway.RestApi;

  constructor(scope: Construct, id: string, props: AlarmVideoStackProps = {}) {
    super(scope, id, props);

    this.storageBucket = new s3.Bucket(this, 'AlarmStorage', {
      blockPublicAccess: s3.BlockPublicAccess.BLOCK_ALL,
      encryption: s3.BucketEncryption.S3_MANAGED,
      enforceSSL: true,
      lifecycleRules: [
        {
          id: 'ExpireAlarmArtifacts',
          expiration: cdk.Duration.days(MAX_RETENTION_DAYS),
        },
      ],
      removalPolicy: cdk.RemovalPolicy.RETAIN,
    });

    this.alarmDLQ = new sqs.Queue(this, 'AlarmDLQ', {
      queueName: 'alarm-video-dlq',
      retentionPeriod: cdk.Duration.days(14),
    });

    const receiverTimeout = cdk.Duration.minutes(5);

    this.alarmQueue = new sqs.Queue(this, 'AlarmQueue', {
      queueName: 'alarm-video-queue',
      // Must cover a full receiver run or messages are redelivered mid-flight
      visibilityTimeout: cdk.Duration.seconds(receiverTimeout.toSeconds() + 60),
      retentionPeriod: cdk.Duration.days(4),
      deadLetterQueue: {
        queue: this.alarmDLQ,
        maxReceiveCount: MAX_RECEIVE_COUNT,
      },
    });

    this.credentialsSecret = new secretsmanager.Secret(this, 'VideoSystemCredentials', {
      description: 'Hostname, username and password of the video system',
    });

    const bundling: nodejs.BundlingOptions = {
      minify: true,
      sourceMap: true,
      externalModules: ['@aws-sdk/*'], // AWS SDK v3 is included in Lambda runtime
    };

    this.receiverLambda = new nodejs.NodejsFunction(this, 'ReceiverLambda', {
      functionName: 'alarm-video-receiver',
      entry: path.join(__dirname, '../src/lambda/receiver/index.ts'),
      handler: 'handler',
      runtime: lambda.Runtime.NODEJS_20_X,
      timeout: receiverTimeout,
      memorySize: 2048,
      ephemeralStorageSize: cdk.Size.mebibytes(2048),
      layers: props.chromiumLayerArn
        ? [lambda.LayerVersion.fromLayerVersionArn(this, 'ChromiumLayer', props.chromiumLayerArn)]
        : undefined,
      environment: {
        FUNCTION_NAME: 'alarm-video-receiver',
        STORAGE_BUCKET: this.storageBucket.bucketName,
        ALARM_QUEUE_URL: this.alarmQueue.queueUrl,
        ALARM_DLQ_URL: this.alarmDLQ.queueUrl,
        CREDENTIALS_SECRET_ARN: this.credentialsSecret.secretArn,
        METRICS_NAMESPACE,
        ...(props.chromiumPath ? { CHROMIUM_PATH: props.chromiumPath } : {}),
        ...(props.deviceMetadata ? { DEVICE_METADATA: props.deviceMetadata } : {}),
        ...(props.timeZone ? { TIME_ZONE: props.timeZone } : {}),
      },
      bundling,
    });

    this.storageBucket.grantReadWrite(this.receiverLambda);
    this.alarmQueue.grantSendMessages(this.receiverLambda);
    this.credentialsSecret.grantRead(this.receiverLambda);

    this.receiverLambda.addToRolePolicy(new iam.PolicyStatement({
      actions: ['cloudwatch:PutMetricData'],
      resources: ['*'],
    }));

    // Failed records are reported individually so the rest of the batch is not redelivered
    this.receiverLambda.addEventSource(new eventsources.SqsEventSource(this.alarmQueue, {
      batchSize: 1,
      reportBatchItemFailures: true,
    }));

    // Keep-alive: the receiver answers scheduled events with a no-op
    new events.Rule(this, 'ReceiverKeepAlive', {
      schedule: events.Schedule.rate(cdk.Duration.minutes(5)),
      targets: [new targets.LambdaFunction(this.receiverLambda)],
    });

    this.healthLambda = new nodejs.NodejsFunction(this, 'HealthLambda', {
      functionName: 'alarm-video-health',
      entry: path.join(__dirname, '../src/lambda/health/index.ts'),
      handler: 'handler',
      runtime: lambda.Runtime.NODEJS_20_X,
      timeout: cdk.Duration.seconds(5),
      memorySize: 256,
      environment: {
        FUNCTION_NAME: 'alarm-video-health',
        STORAGE_BUCKET: this.storageBucket.bucketName,
        ALARM_DLQ_URL: this.alarmDLQ.queueUrl,
      },
      bundling,
    });

    this.healthLambda.addToRolePolicy(new iam.PolicyStatement({
      actions: ['s3:ListBucket'],
      resources: [this.storageBucket.bucketArn],
    }));

    this.healthLambda.addToRolePolicy(new iam.PolicyStatement({
      actions: ['sqs:GetQueueAttributes'],
      resources: [this.alarmDLQ.queueArn],
    }));

    this.api = new apigateway.RestApi(this, 'AlarmVideoApi', {
      restApiName: 'Alarm Video Service API',
      description: 'Alarm webhook and video lookups',
      deployOptions: {
        stageName: 'prod',
        metricsEnabled: true,
      },
    });

    // The receiver answers OPTIONS itself, so every method is proxied
    const receiverIntegration = new apigateway.LambdaIntegration(this.receiverLambda, {
      proxy: true,
      allowTestInvoke: true,
    });

    const errorResponseModel = this.api.addModel('ErrorResponse', {
      contentType: 'application/json',
      modelName: 'ErrorResponse',
      schema: {
        type: apigateway.JsonSchemaType.OBJECT,
        properties: {
          msg: { type: apigateway.JsonSchemaType.STRING },
        },
        required: ['msg'],
      },
    });

    const videoLookupModel = this.api.addModel('VideoLookup', {
      contentType: 'application/json',
      modelName: 'VideoLookup',
      schema: {
        type: apigateway.JsonSchemaType.OBJECT,
        properties: {
          downloadUrl: { type: apigateway.JsonSchemaType.STRING },
          filename: { type: apigateway.JsonSchemaType.STRING },
          videoKey: { type: apigateway.JsonSchemaType.STRING },
          eventKey: { type: apigateway.JsonSchemaType.STRING },
          eventId: { type: apigateway.JsonSchemaType.STRING },
          timestamp: { type: apigateway.JsonSchemaType.NUMBER },
          eventDate: { type: apigateway.JsonSchemaType.STRING },
          expiresAt: { type: apigateway.JsonSchemaType.STRING },
          eventData: { type: [apigateway.JsonSchemaType.OBJECT, apigateway.JsonSchemaType.NULL] },
          message: { type: apigateway.JsonSchemaType.STRING },
        },
        required: ['downloadUrl', 'filename', 'videoKey', 'eventKey', 'timestamp', 'eventDate', 'expiresAt'],
      },
    });

    const lookupResponses: apigateway.MethodResponse[] = [
      { statusCode: '200', responseModels: { 'application/json': videoLookupModel } },
      { statusCode: '400', responseModels: { 'application/json': errorResponseModel } },
      { statusCode: '404', responseModels: { 'application/json': errorResponseModel } },
      { statusCode: '500', responseModels: { 'application/json': errorResponseModel } },
    ];

    this.api.root.addMethod('GET', receiverIntegration, { methodResponses: lookupResponses });
    this.api.root.addMethod('OPTIONS', receiverIntegration);
    this.api.root.addResource('latestvideo').addMethod('GET', receiverIntegration, {
      methodResponses: lookupResponses,
    });

    const alarmResource = this.api.root.addResource('alarmevent');
    alarmResource.addMethod('POST', receiverIntegration);
    alarmResource.addMethod('OPTIONS', receiverIntegration);

    // Everything else reaches the receiver, which answers 404 or 405
    this.api.root.addProxy({ defaultIntegration: receiverIntegration, anyMethod: true });

    const healthIntegration = new apigateway.LambdaIntegration(this.healthLambda, {
      proxy: true,
      allowTestInvoke: true,
    });
    this.api.root.addResource('health').addMethod('GET', healthIntegration);

    new cdk.CfnOutput(this, 'ApiEndpoint', {
      value: this.api.url,
      description: 'Alarm Video Service API endpoint',
      exportName: 'AlarmVideoApiEndpoint',
    });

    new cdk.CfnOutput(this, 'StorageBucketName', {
      value: this.storageBucket.bucketName,
      description: 'Bucket holding alarm metadata and videos',
    });

    // ALARMS
    const processingFailureRateAlarm = new cloudwatch.Alarm(this, 'ProcessingFailureRateAlarm', {
      alarmName: 'AlarmVideoService-ProcessingFailureRate',
      alarmDescription: 'Alert when more than 20% of processed alarms fail',
      metric: new cloudwatch.MathExpression({
        expression: '(failed / (recorded + stored + failed)) * 100',
        usingMetrics: {
          recorded: this.processedMetric('Recorded'),
          stored: this.processedMetric('VideoStored'),
          failed: this.processedMetric('Failed'),
        },
        period: cdk.Duration.minutes(15),
      }),
      threshold: 20,
      evaluationPeriods: 2,
      comparisonOperator: cloudwatch.ComparisonOperator.GREATER_THAN_THRESHOLD,
      treatMissingData: cloudwatch.TreatMissingData.NOT_BREACHING,
    });

    const dlqDepthAlarm = new cloudwatch.Alarm(this, 'DLQDepthAlarm', {
      alarmName: 'AlarmVideoService-DLQDepth',
      alarmDescription: 'Alert when alarms are being dead-lettered',
      metric: this.alarmDLQ.metricApproximateNumberOfMessagesVisible({
        period: cdk.Duration.minutes(1),
        statistic: 'Maximum',
      }),
      threshold: 0,
      evaluationPeriods: 1,
      comparisonOperator: cloudwatch.ComparisonOperator.GREATER_THAN_THRESHOLD,
      treatMissingData: cloudwatch.TreatMissingData.NOT_BREACHING,
    });

    new cdk.CfnOutput(this, 'ProcessingFailureRateAlarmArn', {
      value: processingFailureRateAlarm.alarmArn,
      description: 'Processing failure rate alarm ARN',
    });

    new cdk.CfnOutput(this, 'DLQDepthAlarmArn', {
      value: dlqDepthAlarm.alarmArn,
      description: 'DLQ depth alarm ARN',
    });
  }

  private processedMetric(status: string): cloudwatch.Metric {
    return new cloudwatch.Metric({
      namespace: METRICS_NAMESPACE,
      metricName: 'AlarmsProcessed',
      statistic: 'Sum',
      period: cdk.Duration.minutes(15),
      dimensionsMap: { Status: status },
    });
  }
}
