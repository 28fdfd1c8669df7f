import { Construct } from "constructs";

import * as cdk from "aws-cdk-lib";
import { Runtime } from "aws-cdk-lib/aws-lambda";
import { Bucket, EventType, BlockPublicAccess } from "aws-cdk-lib/aws-s3";
import { NodejsFunction } from "aws-cdk-lib/aws-lambda-nodejs";
import { LambdaDestination } from "aws-cdk-lib/aws-s3-notifications";

import { OutputFormat, defaultOutputFormat } from "../helpers/constants";

export interface ChannelSplitterStackProps extends cdk.StackProps {
  variables: {
    stage: "dev" | "prod";

    projectPrefix: string;
    alarmSubscriptionEmail: string;
    outputFormat?: OutputFormat;
  };
}

export class ChannelSplitterStack extends cdk.Stack {
  constructor(scope: Construct, id: string, props: ChannelSplitterStackProps) {
    super(scope, id, {
      ...props,
    });

    const { projectPrefix, stage } = props.variables;

    const removalPolicy =
      stage === "dev" ? cdk.RemovalPolicy.DESTROY : cdk.RemovalPolicy.RETAIN;

    //uploads land here
    const sourceBucket = new Bucket(this, `${projectPrefix}-source-bucket`, {
      versioned: false,
      bucketName: `${projectPrefix}-source-bucket`.toLowerCase(),
      removalPolicy,
      blockPublicAccess: BlockPublicAccess.BLOCK_ALL,
    });

    //kept apart from the source bucket so the outputs never trigger the function again
    const destinationBucket = new Bucket(
      this,
      `${projectPrefix}-destination-bucket`,
      {
        versioned: false,
        bucketName: `${projectPrefix}-destination-bucket`.toLowerCase(),
        removalPolicy,
        blockPublicAccess: BlockPublicAccess.BLOCK_ALL,
      }
    );

    const splittingLambda = new NodejsFunction(
      this,
      `${projectPrefix}-splitting-lambda`,
      {
        functionName: `${projectPrefix}-splitting-lambda`,
        description:
          "this lambda splits every image uploaded to the source bucket into its red, green and blue channels",
        timeout: cdk.Duration.minutes(1.5),
        runtime: Runtime.NODEJS_20_X,
        environment: {
          REGION: this.region,
          DESTINATION_BUCKET: destinationBucket.bucketName,
          OUTPUT_FORMAT: props.variables.outputFormat ?? defaultOutputFormat,
        },
        entry: "./resources/splitting-handler.ts",
        handler: "handler",
        memorySize: 1536,
        bundling: {
          sourceMap: true,
          minify: true,
          nodeModules: ["sharp"], //sharp ships native binaries, install it for the lambda platform instead of bundling it
        },
      }
    );

    sourceBucket.grantRead(splittingLambda);
    destinationBucket.grantPut(splittingLambda);

    //trigger the splitting lambda when there is a new object added to the source bucket
    sourceBucket.addEventNotification(
      EventType.OBJECT_CREATED,
      new LambdaDestination(splittingLambda)
    );

    const snsTopic = new cdk.aws_sns.Topic(this, `${projectPrefix}-sns-topic`, {
      topicName: `${projectPrefix}-sns-topic`,
      displayName: `${projectPrefix}-ERROR`,
    });

    snsTopic.addSubscription(
      new cdk.aws_sns_subscriptions.EmailSubscription(
        props.variables.alarmSubscriptionEmail
      )
    );

    //this alarm is triggered if there have been 3 errors or more in the splitting lambda in the last 10 minutes
    const splittingErrorAlarm = new cdk.aws_cloudwatch.Alarm(
      this,
      `${projectPrefix}-splitting-errors-alarm`,
      {
        metric: splittingLambda.metricErrors({
          period: cdk.Duration.minutes(10),
          statistic: "sum",
        }),
        evaluationPeriods: 1,
        threshold: 3,
        comparisonOperator:
          cdk.aws_cloudwatch.ComparisonOperator
            .GREATER_THAN_OR_EQUAL_TO_THRESHOLD,
        actionsEnabled: true,
        alarmName: `${projectPrefix}-splitting-alarm`.toUpperCase(),
        alarmDescription:
          "There have been 3 or more errors in the lambda for splitting images in the last 10 minutes",
      }
    );

    splittingErrorAlarm.addAlarmAction(
      new cdk.aws_cloudwatch_actions.SnsAction(snsTopic)
    );

    new cdk.CfnOutput(this, "SourceBucketName", {
      value: sourceBucket.bucketName,
    });

    new cdk.CfnOutput(this, "DestinationBucketName", {
      value: destinationBucket.bucketName,
    });
  }
}
