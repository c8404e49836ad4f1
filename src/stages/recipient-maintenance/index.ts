// One-off maintenance of user records: correlation ids, unsubscribe fields,
// verification flags and suppressed addresses
import { DeleteCommand, QueryCommand, ScanCommand, UpdateCommand } from '@aws-sdk/lib-dynamodb';
import { v4 as uuidv4 } from 'uuid';
import { dynamoDocClient } from '../../shared/utils/aws-clients';
import { config } from '../../shared/utils/environment';
import { ItemStoreError, NotFoundError, errorMessage } from '../../shared/utils/error-handling';
import { fileExists, readFileContent } from '../../shared/utils/file-handler';
import { USER_KEY_PREFIX, userPartitionKey } from '../../shared/utils/item-keys';
import type { ProgressChannel } from '../../shared/utils/progress-tracker';
import { generateRandomToken } from '../../shared/utils/unsubscribe-tokens';

const SOURCE = 'users';
const PROGRESS_EVERY = 50;

export interface MaintenanceSummary {
  scanned: number;
  updated: number;
  skipped: number;
  /** Items the update could not be keyed for */
  unkeyed: number;
}

export interface VerificationSummary {
  scanned: number;
  updated: number;
  skipped: number;
  missingCreatedAt: number;
  errors: number;
}

export interface SuppressionSummary {
  processed: number;
  deleted: number;
  missing: number;
  missingNPage: number;
  errors: number;
}

interface ScanScope {
  tableName: string;
  projection?: string;
  filter?: string;
  values?: Record<string, unknown>;
}

function isBlank(value: unknown): boolean {
  return typeof value !== 'string' || value.trim() === '';
}

async function forEachItem(
  scope: ScanScope,
  visit: (item: Record<string, unknown>) => Promise<void>
): Promise<void> {
  let exclusiveStartKey: Record<string, unknown> | undefined;
  do {
    const response = await dynamoDocClient.send(new ScanCommand({
      TableName: scope.tableName,
      ProjectionExpression: scope.projection,
      FilterExpression: scope.filter,
      ExpressionAttributeValues: scope.values,
      ExclusiveStartKey: exclusiveStartKey
    }));

    for (const item of response.Items ?? []) {
      await visit(item);
    }
    exclusiveStartKey = response.LastEvaluatedKey;
  } while (exclusiveStartKey);
}

/**
 * Random id as 32 hex digits, no dashes
 */
export function newCorrelationId(): string {
  return uuidv4().replace(/-/g, '');
}

/**
 * Adds a random `cid` to every user record that has none; existing values are kept
 */
export async function initializeCorrelationIds(progress: ProgressChannel): Promise<MaintenanceSummary> {
  const idAttribute = config.userAttributes.id;
  const cidAttribute = config.userAttributes.cid;
  const summary: MaintenanceSummary = { scanned: 0, updated: 0, skipped: 0, unkeyed: 0 };

  try {
    await forEachItem({ tableName: config.usersTable, projection: `${idAttribute}, NPage, ${cidAttribute}` }, async item => {
      summary.scanned++;

      const id = item[idAttribute];
      const nPage = item['NPage'];
      if (id === undefined || isBlank(nPage)) {
        summary.unkeyed++;
        return;
      }
      if (!isBlank(item[cidAttribute])) {
        summary.skipped++;
        return;
      }

      await dynamoDocClient.send(new UpdateCommand({
        TableName: config.usersTable,
        Key: { [idAttribute]: id, NPage: nPage },
        UpdateExpression: 'SET #cid = :cid',
        ExpressionAttributeNames: { '#cid': cidAttribute },
        ExpressionAttributeValues: { ':cid': newCorrelationId() }
      }));
      summary.updated++;

      if ((summary.updated + summary.skipped) % PROGRESS_EVERY === 0) {
        progress.emit(SOURCE, `Scanned ${summary.scanned}, updated ${summary.updated}, skipped ${summary.skipped}, missing key ${summary.unkeyed}.`);
      }
    });
  } catch (error) {
    throw new ItemStoreError('initialize correlation ids', error);
  }

  progress.emit(
    SOURCE,
    `Correlation ids initialized. Scanned ${summary.scanned}, updated ${summary.updated}, skipped ${summary.skipped}, missing key ${summary.unkeyed}.`
  );
  return summary;
}

/**
 * Adds `UnsubscribeToken` and `Unsubscribed = false` where either is missing
 */
export async function initializeUnsubscribeFields(progress: ProgressChannel): Promise<MaintenanceSummary> {
  const idAttribute = config.userAttributes.id;
  const unsubscribedAttribute = config.userAttributes.unsubscribed;
  const summary: MaintenanceSummary = { scanned: 0, updated: 0, skipped: 0, unkeyed: 0 };

  try {
    await forEachItem({ tableName: config.usersTable }, async item => {
      summary.scanned++;

      const id = item[idAttribute];
      if (id === undefined) {
        summary.unkeyed++;
        return;
      }

      const hasToken = !isBlank(item['UnsubscribeToken']);
      const hasUnsubscribed = unsubscribedAttribute in item;
      if (hasToken && hasUnsubscribed) {
        summary.skipped++;
        return;
      }

      const setClauses: string[] = [];
      const names: Record<string, string> = {};
      const values: Record<string, unknown> = {};
      if (!hasToken) {
        setClauses.push('UnsubscribeToken = :token');
        values[':token'] = generateRandomToken();
      }
      if (!hasUnsubscribed) {
        setClauses.push('#unsub = :falseVal');
        names['#unsub'] = unsubscribedAttribute;
        values[':falseVal'] = false;
      }

      await dynamoDocClient.send(new UpdateCommand({
        TableName: config.usersTable,
        Key: { [idAttribute]: id },
        UpdateExpression: `SET ${setClauses.join(', ')}`,
        ExpressionAttributeNames: Object.keys(names).length > 0 ? names : undefined,
        ExpressionAttributeValues: values
      }));
      summary.updated++;
    });
  } catch (error) {
    throw new ItemStoreError('initialize unsubscribe fields', error);
  }

  progress.emit(SOURCE, `Unsubscribe fields initialized. Updated ${summary.updated} user(s), skipped ${summary.skipped} user(s).`);
  return summary;
}

/**
 * Marks every user verified, taking VerifiedAt from CreatedAt. Users already
 * verified with a VerifiedAt are left alone; a failed update is counted and
 * the run goes on.
 */
export async function markUsersVerified(progress: ProgressChannel): Promise<VerificationSummary> {
  const idAttribute = config.userAttributes.id;
  const verifiedAttribute = config.userAttributes.verified;
  const summary: VerificationSummary = { scanned: 0, updated: 0, skipped: 0, missingCreatedAt: 0, errors: 0 };

  try {
    await forEachItem({
      tableName: config.usersTable,
      projection: `${idAttribute}, CreatedAt, ${verifiedAttribute}, VerifiedAt`
    }, async item => {
      summary.scanned++;

      const id = item[idAttribute];
      if (id === undefined) {
        return;
      }
      if (item[verifiedAttribute] === true && !isBlank(item['VerifiedAt'])) {
        summary.skipped++;
      } else if (isBlank(item['CreatedAt'])) {
        summary.missingCreatedAt++;
      } else {
        try {
          await dynamoDocClient.send(new UpdateCommand({
            TableName: config.usersTable,
            Key: { [idAttribute]: id },
            UpdateExpression: 'SET #verified = :trueVal, VerifiedAt = :createdAt',
            ExpressionAttributeNames: { '#verified': verifiedAttribute },
            ExpressionAttributeValues: { ':trueVal': true, ':createdAt': item['CreatedAt'] }
          }));
          summary.updated++;
        } catch (error) {
          summary.errors++;
          console.warn('Marking user verified failed', { id, error: errorMessage(error) });
          progress.emit(SOURCE, `[Verify] Error updating ${String(id)}: ${errorMessage(error)}`);
        }
      }

      const handled = summary.updated + summary.skipped + summary.missingCreatedAt;
      if (handled > 0 && handled % PROGRESS_EVERY === 0) {
        progress.emit(SOURCE, `[Verify] Updated ${summary.updated}, skipped ${summary.skipped}, missing CreatedAt ${summary.missingCreatedAt}.`);
      }
    });
  } catch (error) {
    throw new ItemStoreError('mark users verified', error);
  }

  progress.emit(
    SOURCE,
    `[Verify] Done. Updated ${summary.updated}, skipped ${summary.skipped}, missing CreatedAt ${summary.missingCreatedAt}, errors ${summary.errors}.`
  );
  return summary;
}

/**
 * Addresses from a suppression export: the first line of every three-line record
 */
export async function readSuppressedEmails(filePath: string): Promise<string[]> {
  if (!(await fileExists(filePath))) {
    throw new NotFoundError(`Suppression list ${filePath} does not exist`, [filePath]);
  }

  const lines = (await readFileContent(filePath)).split(/\r?\n/);
  const emails: string[] = [];
  for (let index = 0; index < lines.length; index += 3) {
    const email = lines[index].trim();
    if (email !== '') {
      emails.push(email);
    }
  }
  return emails;
}

/**
 * Deletes the item-table user records of suppressed addresses. A failure is
 * counted against its address and the run goes on.
 */
export async function removeSuppressedUsers(progress: ProgressChannel, emails: string[]): Promise<SuppressionSummary> {
  const summary: SuppressionSummary = { processed: 0, deleted: 0, missing: 0, missingNPage: 0, errors: 0 };

  for (const email of emails) {
    summary.processed++;
    const userId = userPartitionKey(email);

    try {
      const response = await dynamoDocClient.send(new QueryCommand({
        TableName: config.itemsTable,
        KeyConditionExpression: 'ID = :id',
        ExpressionAttributeValues: { ':id': userId },
        ProjectionExpression: 'ID, NPage'
      }));

      const items = response.Items ?? [];
      if (items.length === 0) {
        summary.missing++;
      }
      for (const item of items) {
        const nPage = item['NPage'];
        if (isBlank(nPage)) {
          summary.missingNPage++;
          continue;
        }
        await dynamoDocClient.send(new DeleteCommand({
          TableName: config.itemsTable,
          Key: { ID: userId, NPage: nPage }
        }));
        summary.deleted++;
      }
    } catch (error) {
      summary.errors++;
      console.warn('Removing suppressed user failed', { email, error: errorMessage(error) });
      progress.emit(SOURCE, `[Suppress] Error for ${email}: ${errorMessage(error)}`);
    }

    if (summary.processed % PROGRESS_EVERY === 0) {
      progress.emit(
        SOURCE,
        `[Suppress] Processed ${summary.processed}/${emails.length} | Deleted ${summary.deleted}, missing ${summary.missing}, missing NPage ${summary.missingNPage}, errors ${summary.errors}.`
      );
    }
  }

  progress.emit(
    SOURCE,
    `[Suppress] Done. Deleted ${summary.deleted}, missing ${summary.missing}, missing NPage ${summary.missingNPage}, errors ${summary.errors}.`
  );
  return summary;
}

/**
 * Adds a random `cid` to the user records kept in the item table (ID USR#...)
 */
export async function initializeItemsCorrelationIds(progress: ProgressChannel): Promise<MaintenanceSummary> {
  const summary: MaintenanceSummary = { scanned: 0, updated: 0, skipped: 0, unkeyed: 0 };

  try {
    await forEachItem({
      tableName: config.itemsTable,
      projection: 'ID, NPage, cid',
      filter: 'begins_with(ID, :userPrefix)',
      values: { ':userPrefix': USER_KEY_PREFIX }
    }, async item => {
      summary.scanned++;

      const id = item['ID'];
      const nPage = item['NPage'];
      if (isBlank(id) || isBlank(nPage)) {
        summary.unkeyed++;
        return;
      }
      if (!isBlank(item['cid'])) {
        summary.skipped++;
        return;
      }

      await dynamoDocClient.send(new UpdateCommand({
        TableName: config.itemsTable,
        Key: { ID: id, NPage: nPage },
        UpdateExpression: 'SET cid = :cid',
        ExpressionAttributeValues: { ':cid': newCorrelationId() }
      }));
      summary.updated++;

      if ((summary.updated + summary.skipped) % PROGRESS_EVERY === 0) {
        progress.emit(SOURCE, `[Items] Scanned ${summary.scanned}, updated ${summary.updated}, skipped ${summary.skipped}.`);
      }
    });
  } catch (error) {
    throw new ItemStoreError('initialize item correlation ids', error);
  }

  progress.emit(
    SOURCE,
    `[Items] Correlation ids initialized. Scanned ${summary.scanned}, updated ${summary.updated}, skipped ${summary.skipped}, missing key ${summary.unkeyed}.`
  );
  return summary;
}
