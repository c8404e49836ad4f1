// Recipient reads and writes against the users table
import { ScanCommand, UpdateCommand } from '@aws-sdk/lib-dynamodb';
import type { Recipient } from '../../shared/models';
import { dynamoDocClient } from '../../shared/utils/aws-clients';
import { config } from '../../shared/utils/environment';
import { ItemStoreError } from '../../shared/utils/error-handling';
import { isValidEmailFormat } from '../../shared/utils/validation';

export const ELIGIBLE_FILTER_VALUES = { ':trueVal': true, ':falseVal': false };

/**
 * Server-side filter matching verified users that have not unsubscribed
 */
export function buildEligibleFilter(attributes = config.userAttributes): string {
  return `${attributes.verified} = :trueVal AND (attribute_not_exists(${attributes.unsubscribed}) OR ${attributes.unsubscribed} = :falseVal)`;
}

function nonEmptyStrings(value: unknown): string[] {
  const values = Array.isArray(value) ? value : [value];
  return values
    .filter((entry): entry is string => typeof entry === 'string')
    .map(entry => entry.trim())
    .filter(entry => entry !== '');
}

/**
 * Email attribute as a string, or the last non-empty entry of a list
 */
export function readEmail(value: unknown): string | undefined {
  const emails = nonEmptyStrings(value);
  return emails.length > 0 ? emails[emails.length - 1] : undefined;
}

/**
 * First name as a string, or the first non-empty entry of a list
 */
export function readFirstName(value: unknown): string | undefined {
  return nonEmptyStrings(value)[0];
}

/**
 * Every user with a well-formed email, deduplicated case-insensitively,
 * filtered client side
 */
export async function fetchRecipients(onlyVerified: boolean = true, onlySubscribed: boolean = true): Promise<Recipient[]> {
  const attributes = config.userAttributes;
  const projection = new Set([attributes.email, attributes.firstName, attributes.id, attributes.cid]);
  if (onlyVerified) projection.add(attributes.verified);
  if (onlySubscribed) projection.add(attributes.unsubscribed);

  const seen = new Set<string>();
  const recipients: Recipient[] = [];
  let malformed = 0;
  let exclusiveStartKey: Record<string, unknown> | undefined;

  try {
    do {
      const response = await dynamoDocClient.send(new ScanCommand({
        TableName: config.usersTable,
        ProjectionExpression: [...projection].join(', '),
        ExclusiveStartKey: exclusiveStartKey
      }));

      for (const item of response.Items ?? []) {
        const email = readEmail(item[attributes.email]);
        if (!email || seen.has(email.toLowerCase())) {
          continue;
        }
        if (!isValidEmailFormat(email)) {
          malformed++;
          continue;
        }
        seen.add(email.toLowerCase());

        const verified = item[attributes.verified] === true;
        const unsubscribed = item[attributes.unsubscribed] === true;
        if ((onlyVerified && !verified) || (onlySubscribed && unsubscribed)) {
          continue;
        }

        const id: unknown = item[attributes.id];
        const cid: unknown = item[attributes.cid];
        recipients.push({
          email,
          firstName: readFirstName(item[attributes.firstName]),
          recordKey: id === undefined ? undefined : { [attributes.id]: id },
          correlationId: typeof cid === 'string' && cid.trim() !== '' ? cid.trim() : undefined,
          verified,
          unsubscribed
        });
      }

      exclusiveStartKey = response.LastEvaluatedKey;
    } while (exclusiveStartKey);
  } catch (error) {
    throw new ItemStoreError('scan users', error);
  }

  if (malformed > 0) {
    console.warn('Skipped malformed recipient addresses', { malformed });
  }
  console.log('Fetched recipients', { count: recipients.length, onlyVerified, onlySubscribed });
  return recipients;
}

/**
 * Number of verified, subscribed users, counted by the store
 */
export async function countEligibleRecipients(): Promise<number> {
  let total = 0;
  let exclusiveStartKey: Record<string, unknown> | undefined;

  try {
    do {
      const response = await dynamoDocClient.send(new ScanCommand({
        TableName: config.usersTable,
        Select: 'COUNT',
        FilterExpression: buildEligibleFilter(),
        ExpressionAttributeValues: ELIGIBLE_FILTER_VALUES,
        ExclusiveStartKey: exclusiveStartKey
      }));

      total += response.Count ?? 0;
      exclusiveStartKey = response.LastEvaluatedKey;
    } while (exclusiveStartKey);
  } catch (error) {
    throw new ItemStoreError('count users', error);
  }

  return total;
}

/**
 * Stamps LastEmailDate, keyed by the user id attribute or else the email
 */
export async function updateLastEmailDate(recipient: Recipient, now: Date = new Date()): Promise<void> {
  const key = recipient.recordKey ?? { [config.userAttributes.email]: recipient.email };

  await dynamoDocClient.send(new UpdateCommand({
    TableName: config.usersTable,
    Key: key,
    UpdateExpression: 'SET LastEmailDate = :now',
    ExpressionAttributeValues: { ':now': now.toISOString() }
  }));
}
