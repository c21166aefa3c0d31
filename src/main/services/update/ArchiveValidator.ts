import fs from 'node:fs';
import type { ArchiveValidationErrorCode, ArchiveValidationResult } from '@shared/contracts';

export interface MimeSniffer {
  sniff(filePath: string): Promise<string | null>;
}

export interface ArchiveIntegrityChecker {
  checkIntegrity(filePath: string): Promise<void>;
}

interface ArchiveValidatorOptions {
  mimeSniffer?: MimeSniffer | null;
  integrityChecker?: ArchiveIntegrityChecker | null;
}

const ZIP_MIME_TYPES = new Set(['application/zip', 'application/x-zip-compressed']);

// local file header, end of central directory (arquivo vazio), spanned marker
const ZIP_SIGNATURES = [
  Buffer.from([0x50, 0x4b, 0x03, 0x04]),
  Buffer.from([0x50, 0x4b, 0x05, 0x06]),
  Buffer.from([0x50, 0x4b, 0x07, 0x08])
];

export class ArchiveValidator {
  private readonly mimeSniffer: MimeSniffer | null;
  private readonly integrityChecker: ArchiveIntegrityChecker | null;

  constructor(options?: ArchiveValidatorOptions) {
    this.mimeSniffer = options?.mimeSniffer ?? null;
    this.integrityChecker = options?.integrityChecker ?? null;
  }

  async validate(filePath: string, maxBytes: number): Promise<ArchiveValidationResult> {
    let size: number;
    try {
      const stats = await fs.promises.stat(filePath);
      if (!stats.isFile()) {
        return fail('file_not_found', 'ZIP file not found');
      }
      size = stats.size;
    } catch {
      return fail('file_not_found', 'ZIP file not found');
    }

    if (size > maxBytes) {
      return fail('file_too_large', `Plugin file exceeds size limit of ${formatMegabytes(maxBytes)} MB`);
    }

    if (this.mimeSniffer) {
      const mimeType = await this.mimeSniffer.sniff(filePath);
      if (mimeType !== null && !ZIP_MIME_TYPES.has(mimeType)) {
        return fail('invalid_file_type', 'File is not a valid ZIP archive');
      }
    }

    let signature: Buffer;
    try {
      signature = await readHead(filePath, 4);
    } catch {
      return fail('file_read_error', 'Could not read ZIP file');
    }

    if (!ZIP_SIGNATURES.some((candidate) => candidate.equals(signature))) {
      return fail('invalid_zip_signature', 'File does not have a valid ZIP signature');
    }

    if (this.integrityChecker) {
      try {
        await this.integrityChecker.checkIntegrity(filePath);
      } catch {
        return fail('zip_integrity_failed', 'ZIP file integrity check failed');
      }
    }

    return { ok: true };
  }
}

async function readHead(filePath: string, length: number): Promise<Buffer> {
  const handle = await fs.promises.open(filePath, 'r');
  try {
    const buffer = Buffer.alloc(length);
    const { bytesRead } = await handle.read(buffer, 0, length, 0);
    return buffer.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
}

function fail(code: ArchiveValidationErrorCode, message: string): ArchiveValidationResult {
  return { ok: false, code, message };
}

function formatMegabytes(bytes: number): string {
  const value = bytes / 1024 / 1024;
  return Number.isInteger(value) ? String(value) : value.toFixed(2);
}
