/**
 * DynamoDB client factory
 */

import { DynamoDBClient } from "@aws-sdk/client-dynamodb";
import { DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb";
import type { DbConfig } from "../config.ts";

type ClientConfig = Pick<DbConfig, "dynamoEndpoint" | "region">;

/**
 * Create a DynamoDB client. A local endpoint (DynamoDB Local) gets
 * placeholder credentials unless real ones are in the environment.
 */
export const createDynamoClient = (config: ClientConfig): DynamoDBClient => {
  const region = config.region ?? "us-east-1";

  if (!config.dynamoEndpoint) return new DynamoDBClient({ region });

  return new DynamoDBClient({
    region,
    endpoint: config.dynamoEndpoint,
    credentials: {
      accessKeyId: process.env.AWS_ACCESS_KEY_ID ?? "local",
      secretAccessKey: process.env.AWS_SECRET_ACCESS_KEY ?? "local",
    },
  });
};

/**
 * Create a DynamoDB Document client
 */
export const createDocClient = (config: ClientConfig): DynamoDBDocumentClient =>
  DynamoDBDocumentClient.from(createDynamoClient(config), {
    marshallOptions: { removeUndefinedValues: true },
  });
