import 'source-map-support/register';
import * as cdk from 'aws-cdk-lib';
import { AlarmVideoStack } from '../lib/alarm-video-stack';

const app = new cdk.App();

new AlarmVideoStack(app, 'AlarmVideoStack', {
  env: {
    account: process.env.CDK_DEFAULT_ACCOUNT,
    region: process.env.CDK_DEFAULT_REGION,
  },
  description: 'Alarm event ingestion and delayed video retrieval',
  chromiumPath: app.node.tryGetContext('chromiumPath'),
  chromiumLayerArn: app.node.tryGetContext('chromiumLayerArn'),
  deviceMetadata: app.node.tryGetContext('deviceMetadata'),
  timeZone: app.node.tryGetContext('timeZone'),
});
