// AWS client utilities
import { SESClient } from '@aws-sdk/client-ses';
import { S3Client } from '@aws-sdk/client-s3';
import { EC2Client } from '@aws-sdk/client-ec2';
import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import { config } from './environment';

// SES client, may live in a different region than the data
export const sesClient = new SESClient({
  region: config.regions.ses
});

export const s3Client = new S3Client({
  region: config.regions.primary
});

// EC2 client for the site fleet
export const ec2Client = new EC2Client({
  region: config.regions.ec2
});

const dynamoClient = new DynamoDBClient({
  region: config.regions.primary
});

export const dynamoDocClient = DynamoDBDocumentClient.from(dynamoClient, {
  marshallOptions: { removeUndefinedValues: true }
});
