// Email delivery utilities
import { SendEmailCommand, SendRawEmailCommand } from '@aws-sdk/client-ses';
import { v4 as uuidv4 } from 'uuid';
import { sesClient } from './aws-clients';

export interface OutgoingEmail {
  sender: string;
  recipients: string[];
  subject: string;
  textBody: string;
  htmlBody?: string;
  headers?: Record<string, string>;
}

/**
 * Encodes the characters HTML treats specially
 */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/**
 * One-click unsubscribe headers (RFC 8058)
 */
export function buildUnsubscribeHeaders(unsubscribeUrl: string, sender: string): Record<string, string> {
  return {
    'List-Unsubscribe': `<mailto:${sender}>, <${unsubscribeUrl}>`,
    'List-Unsubscribe-Post': 'List-Unsubscribe=One-Click'
  };
}

/**
 * Builds a multipart/alternative MIME document carrying custom headers
 */
export function buildRawMimeMessage(email: OutgoingEmail, boundary: string = `NextPart_${uuidv4().replace(/-/g, '')}`): string {
  const htmlPart = email.htmlBody ?? escapeHtml(email.textBody);
  const lines: string[] = [
    `From: ${email.sender}`,
    `To: ${email.recipients.join(', ')}`,
    `Subject: ${email.subject}`,
    ...Object.entries(email.headers ?? {}).map(([name, value]) => `${name}: ${value}`),
    'MIME-Version: 1.0',
    `Content-Type: multipart/alternative; boundary="${boundary}"`,
    '',
    `--${boundary}`,
    'Content-Type: text/plain; charset="UTF-8"',
    'Content-Transfer-Encoding: 7bit',
    '',
    email.textBody,
    '',
    `--${boundary}`,
    'Content-Type: text/html; charset="UTF-8"',
    'Content-Transfer-Encoding: 7bit',
    '',
    htmlPart,
    '',
    `--${boundary}--`,
    ''
  ];

  return lines.join('\r\n');
}

/**
 * Send email using SES; messages with custom headers go out raw
 */
export async function sendEmail(email: OutgoingEmail): Promise<void> {
  if (email.headers && Object.keys(email.headers).length > 0) {
    const command = new SendRawEmailCommand({
      Source: email.sender,
      Destinations: email.recipients,
      RawMessage: {
        Data: Buffer.from(buildRawMimeMessage(email), 'utf8')
      }
    });

    await sesClient.send(command);
    return;
  }

  const command = new SendEmailCommand({
    Source: email.sender,
    Destination: {
      ToAddresses: email.recipients
    },
    Message: {
      Subject: {
        Data: email.subject,
        Charset: 'UTF-8'
      },
      Body: {
        Text: {
          Data: email.textBody,
          Charset: 'UTF-8'
        },
        ...(email.htmlBody ? {
          Html: {
            Data: email.htmlBody,
            Charset: 'UTF-8'
          }
        } : {})
      }
    }
  });

  await sesClient.send(command);
}
