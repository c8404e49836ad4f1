#!/usr/bin/env node

/**
 * Command-line front end of the design publishing pipeline
 *
 *   publish <batchFolder> [--campaign]   publish one design, optionally notify subscribers
 *   verify                               reboot the site fleet and wait for health
 *   boards create | boards rename        Pinterest board maintenance
 *   audit [reportPath]                   report designs with missing PDFs
 *   users init-cids | init-unsubscribe | init-item-cids | mark-verified
 *   users remove-suppressed <listFile>   delete the records of suppressed addresses
 *   admin-preview <designId>             send a design's subscriber email to the admin only
 *   text-campaign <subject> <bodyFile>   send a free-text announcement
 */

import { config } from '../src/shared/utils/environment';
import { describeError } from '../src/shared/utils/error-handling';
import { readFileContent } from '../src/shared/utils/file-handler';
import { EnvAccessTokenProvider, PinterestClient } from '../src/shared/utils/pinterest-client';
import { createConsoleProgressChannel } from '../src/shared/utils/progress-tracker';
import { createBoardsAndCsv, renameBoardsFromCsv } from '../src/stages/board-manager';
import { verifyInfrastructure } from '../src/stages/infra-verifier';
import { findDesign } from '../src/stages/item-catalog';
import { NotificationCampaign, toAnnouncementDesign } from '../src/stages/notification-campaign';
import { createPipelineDependencies, publishDesign } from '../src/stages/orchestrator';
import { auditMissingPdfs } from '../src/stages/pdf-audit';
import {
  initializeCorrelationIds,
  initializeItemsCorrelationIds,
  initializeUnsubscribeFields,
  markUsersVerified,
  readSuppressedEmails,
  removeSuppressedUsers
} from '../src/stages/recipient-maintenance';

const USAGE = [
  'Usage:',
  '  uploader publish <batchFolder> [--campaign]',
  '  uploader verify',
  '  uploader boards create|rename',
  '  uploader audit [reportPath]',
  '  uploader users init-cids|init-unsubscribe|init-item-cids|mark-verified',
  '  uploader users remove-suppressed <listFile>',
  '  uploader admin-preview <designId>',
  '  uploader text-campaign <subject> <bodyFile>'
].join('\n');

function fail(message: string): never {
  console.error(`❌ ${message}`);
  console.error(USAGE);
  process.exit(1);
}

async function run(args: string[], signal: AbortSignal): Promise<number> {
  const [command, ...rest] = args;
  const progress = createConsoleProgressChannel();

  switch (command) {
    case 'publish': {
      const folder = rest.find(arg => !arg.startsWith('--'));
      if (!folder) fail('publish needs a batch folder');

      const result = await publishDesign(
        { batchFolderPath: folder, runCampaign: rest.includes('--campaign'), signal },
        createPipelineDependencies(progress, signal)
      );

      if (result.status === 'failed') {
        console.error(`❌ ${result.message}`);
        return 1;
      }
      console.log(`✅ Design ${result.record.designId} published (pin ${result.record.pinId ?? 'without id'})`);
      if (result.campaign.status === 'skipped') {
        console.log(`ℹ️  Campaign skipped: ${result.campaign.reason}`);
      }
      return 0;
    }

    case 'verify': {
      const outcome = await verifyInfrastructure(progress, { signal });
      return outcome.status === 'success' ? 0 : 1;
    }

    case 'boards': {
      const client = new PinterestClient(new EnvAccessTokenProvider());
      if (rest[0] === 'create') {
        const rows = await createBoardsAndCsv(client, progress, { signal });
        console.log(`✅ Created ${rows.length} board(s)`);
        return 0;
      }
      if (rest[0] === 'rename') {
        const renamed = await renameBoardsFromCsv(client, progress, { signal });
        console.log(`✅ Renamed ${renamed} board(s)`);
        return 0;
      }
      return fail(`unknown boards action '${rest[0] ?? ''}'`);
    }

    case 'audit': {
      const result = await auditMissingPdfs(progress, rest[0]);
      return result.missing.length === 0 ? 0 : 2;
    }

    case 'users': {
      if (rest[0] === 'init-cids') {
        await initializeCorrelationIds(progress);
        return 0;
      }
      if (rest[0] === 'init-unsubscribe') {
        await initializeUnsubscribeFields(progress);
        return 0;
      }
      if (rest[0] === 'init-item-cids') {
        await initializeItemsCorrelationIds(progress);
        return 0;
      }
      if (rest[0] === 'mark-verified') {
        const summary = await markUsersVerified(progress);
        return summary.errors === 0 ? 0 : 1;
      }
      if (rest[0] === 'remove-suppressed') {
        if (!rest[1]) fail('remove-suppressed needs a suppression list file');
        const summary = await removeSuppressedUsers(progress, await readSuppressedEmails(rest[1]));
        return summary.errors === 0 ? 0 : 1;
      }
      return fail(`unknown users action '${rest[0] ?? ''}'`);
    }

    case 'admin-preview': {
      const designId = Number(rest[0]);
      if (!Number.isInteger(designId) || designId <= 0) fail('admin-preview needs a design id');

      const record = await findDesign(designId);
      if (!record) {
        console.error(`❌ Design ${designId} not found`);
        return 1;
      }
      await new NotificationCampaign(progress).sendAdminPreview(toAnnouncementDesign(record, config.photoFileName));
      return 0;
    }

    case 'text-campaign': {
      const [subject, bodyFile] = rest;
      if (!subject || !bodyFile) fail('text-campaign needs a subject and a body file');

      const body = await readFileContent(bodyFile);
      const campaign = new NotificationCampaign(progress, { label: '[TextEmail]', signal });
      const summary = await campaign.runTextCampaign({ subject, body });
      console.log(`✅ Sent ${summary.batch.sent} text email(s)`);
      return 0;
    }

    default:
      return fail(command ? `unknown command '${command}'` : 'no command given');
  }
}

function main(): void {
  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.log('\n⚠️  Cancelling after the current step...');
    controller.abort();
  });

  run(process.argv.slice(2), controller.signal)
    .then(code => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(`❌ ${describeError(error)}`);
      process.exitCode = 1;
    });
}

main();
