import { randomBytes } from 'node:crypto';
import { createReadStream } from 'node:fs';
import { access, constants } from 'node:fs/promises';
import { Readable } from 'node:stream';
import { LocalFileError } from '../core/errors.js';
import { basename } from './url-path.js';

export interface FormPart {
  name: string;
  value?: string;
  filePath?: string;
  filename?: string;
}

export interface AssembledForm {
  boundary: string;
  contentType: string;
  parts: FormPart[];
  /** Streams the encoded body; file parts are read from disk lazily */
  body: Readable;
}

const CRLF = '\r\n';

export function createBoundary(): string {
  return `----wirekit${randomBytes(12).toString('hex')}`;
}

function escapeName(value: string): string {
  return value
    .replace(/"/g, '%22')
    .replace(/\r/g, '%0D')
    .replace(/\n/g, '%0A');
}

/**
 * One part per text field, then one part per file field
 */
export function buildFormParts(
  fields: Record<string, string>,
  files: Record<string, string>
): FormPart[] {
  const parts: FormPart[] = Object.entries(fields).map(([name, value]) => ({ name, value }));

  for (const [name, filePath] of Object.entries(files)) {
    parts.push({ name, filePath, filename: basename(filePath) });
  }

  return parts;
}

async function* renderForm(parts: FormPart[], boundary: string): AsyncGenerator<Buffer> {
  for (const part of parts) {
    let head = `--${boundary}${CRLF}Content-Disposition: form-data; name="${escapeName(part.name)}"`;

    if (part.filePath !== undefined) {
      head += `; filename="${escapeName(part.filename ?? basename(part.filePath))}"${CRLF}`;
      head += `Content-Type: application/octet-stream${CRLF}${CRLF}`;
      yield Buffer.from(head, 'utf8');

      const file: AsyncIterable<Buffer> = createReadStream(part.filePath);
      for await (const chunk of file) {
        yield chunk;
      }
    } else {
      yield Buffer.from(`${head}${CRLF}${CRLF}${part.value ?? ''}`, 'utf8');
    }

    yield Buffer.from(CRLF, 'ascii');
  }

  yield Buffer.from(`--${boundary}--${CRLF}`, 'ascii');
}

/**
 * Assemble a `multipart/form-data` body from text fields and local files.
 *
 * @example
 * ```typescript
 * const form = assembleFormData({ title: 'Report' }, { upload: '/tmp/report.pdf' });
 * // form.contentType === 'multipart/form-data; boundary=----wirekit…'
 * ```
 */
export function assembleFormData(
  fields: Record<string, string>,
  files: Record<string, string>,
  boundary: string = createBoundary()
): AssembledForm {
  const parts = buildFormParts(fields, files);

  return {
    boundary,
    contentType: `multipart/form-data; boundary=${boundary}`,
    parts,
    body: Readable.from(renderForm(parts, boundary)),
  };
}

/**
 * Confirm every local file can be read, before any connection is made
 *
 * @throws {LocalFileError} naming the first unreadable file
 */
export async function verifyReadable(paths: string[]): Promise<void> {
  for (const path of paths) {
    try {
      await access(path, constants.R_OK);
    } catch {
      throw new LocalFileError(`Unable to open file for upload: ${path}`, path);
    }
  }
}
