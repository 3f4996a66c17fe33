import { readFile } from 'node:fs/promises';
import { LocalFileError } from '../core/errors.js';
import { basename } from './url-path.js';

/** Boundary between the parts of every multipart mail */
export const MAIL_BOUNDARY = 'WIREKIT-BOUNDARY';

const CRLF = '\r\n';
const BASE64_LINE_LENGTH = 76;

/**
 * One named, typed chunk of a multipart message. Inline parts carry
 * `data`; attachments carry `filePath` and are read when the message is
 * assembled.
 */
export interface MimePart {
  name?: string;
  contentType: string;
  data?: Buffer | string;
  filePath?: string;
  filename?: string;
  encoding?: 'base64';
}

export interface MailEnvelope {
  from: string;
  to: string;
  subject: string;
}

function bodyContentType(isHtml: boolean): string {
  return `${isHtml ? 'text/html' : 'text/plain'}; charset=UTF-8`;
}

/**
 * Body part first, then one base64 `application/octet-stream` part per
 * attachment. Attachment filenames are the last segment of their path.
 */
export function buildMailParts(message: string, isHtml: boolean, attachments: string[]): MimePart[] {
  const parts: MimePart[] = [
    { name: 'body', contentType: bodyContentType(isHtml), data: message },
  ];

  for (const filePath of attachments) {
    parts.push({
      contentType: 'application/octet-stream',
      filePath,
      filename: basename(filePath),
      encoding: 'base64',
    });
  }

  return parts;
}

/**
 * Header block of a flat mail, each line CRLF-terminated
 */
export function flatMailHeaders(envelope: MailEnvelope, isHtml: boolean): string {
  return [
    `From: ${envelope.from}`,
    `To: ${envelope.to}`,
    `Subject: ${envelope.subject}`,
    `Content-Type: ${bodyContentType(isHtml)}`,
  ].map((line) => line + CRLF).join('');
}

/**
 * Single-part mail: header block, blank line, body, CRLF
 */
export function assembleFlatMail(envelope: MailEnvelope, message: string, isHtml: boolean): Buffer {
  return Buffer.from(flatMailHeaders(envelope, isHtml) + CRLF + message + CRLF, 'utf8');
}

/**
 * Wrap base64 output at 76 characters per line
 */
export function encodeBase64Lines(data: Buffer): string {
  const encoded = data.toString('base64');
  const lines: string[] = [];
  for (let i = 0; i < encoded.length; i += BASE64_LINE_LENGTH) {
    lines.push(encoded.substring(i, i + BASE64_LINE_LENGTH));
  }
  return lines.join(CRLF);
}

async function loadPart(part: MimePart): Promise<Buffer> {
  if (part.filePath !== undefined) {
    try {
      return await readFile(part.filePath);
    } catch {
      throw new LocalFileError(`Unable to open attachment: ${part.filePath}`, part.filePath);
    }
  }

  if (part.data === undefined) return Buffer.alloc(0);
  return typeof part.data === 'string' ? Buffer.from(part.data, 'utf8') : part.data;
}

function renderPartHeaders(part: MimePart): string {
  let headers = `Content-Type: ${part.contentType}${CRLF}`;
  if (part.encoding === 'base64') {
    headers += `Content-Transfer-Encoding: base64${CRLF}`;
  }
  if (part.filename !== undefined) {
    headers += `Content-Disposition: attachment; filename="${part.filename.replace(/"/g, '\\"')}"${CRLF}`;
  }
  return headers;
}

/**
 * Render a `multipart/mixed` mail. Parts keep their order, so the body
 * part must come before the attachments.
 *
 * @throws {LocalFileError} when an attachment cannot be read
 */
export async function assembleMail(
  envelope: MailEnvelope,
  parts: MimePart[],
  boundary: string = MAIL_BOUNDARY
): Promise<Buffer> {
  const chunks: Buffer[] = [
    Buffer.from(
      `From: ${envelope.from}${CRLF}` +
      `To: ${envelope.to}${CRLF}` +
      `Subject: ${envelope.subject}${CRLF}` +
      `MIME-Version: 1.0${CRLF}` +
      `Content-Type: multipart/mixed; boundary="${boundary}"${CRLF}` +
      CRLF,
      'utf8'
    ),
  ];

  for (const part of parts) {
    const data = await loadPart(part);
    const content = part.encoding === 'base64'
      ? Buffer.from(encodeBase64Lines(data), 'ascii')
      : data;

    chunks.push(Buffer.from(`--${boundary}${CRLF}${renderPartHeaders(part)}${CRLF}`, 'utf8'));
    chunks.push(content);
    chunks.push(Buffer.from(CRLF, 'ascii'));
  }

  chunks.push(Buffer.from(`--${boundary}--${CRLF}`, 'ascii'));
  return Buffer.concat(chunks);
}

/**
 * Build the payload for a mail: flat when there are no attachments,
 * multipart otherwise.
 */
export async function composeMail(
  envelope: MailEnvelope,
  message: string,
  isHtml: boolean,
  attachments: string[]
): Promise<Buffer> {
  if (attachments.length === 0) {
    return assembleFlatMail(envelope, message, isHtml);
  }
  return assembleMail(envelope, buildMailParts(message, isHtml, attachments));
}
