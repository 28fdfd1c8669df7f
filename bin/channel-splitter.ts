#!/usr/bin/env node
import * as cdk from "aws-cdk-lib";

import * as dotenv from "dotenv";

import { ChannelSplitterStack } from "../lib/channel-splitter-stack";

dotenv.config();

function requiredEnv(name: string) {
  const value = process.env[name];

  if (!value) {
    throw new Error(`${name} is not set`);
  }

  return value;
}

const app = new cdk.App();

const projectPrefix = "channel-splitter";

new ChannelSplitterStack(app, "ChannelSplitter-DEV-Stack", {
  variables: {
    stage: "dev",
    projectPrefix: `${projectPrefix}-DEV`,
    alarmSubscriptionEmail: requiredEnv("DEV_SUBSCRIPTION_EMAIL"),
  },
  stackName: "ChannelSplitter-DEV-Stack",
  env: {
    account: process.env.DEV_ACCOUNT,
    region: process.env.REGION,
  },
});

new ChannelSplitterStack(app, "ChannelSplitter-PROD-Stack", {
  variables: {
    stage: "prod",
    projectPrefix: `${projectPrefix}-PROD`,
    alarmSubscriptionEmail: requiredEnv("PROD_SUBSCRIPTION_EMAIL"),
  },
  stackName: "ChannelSplitter-PROD-Stack",
  env: {
    account: process.env.PROD_ACCOUNT,
    region: process.env.REGION,
  },
});
