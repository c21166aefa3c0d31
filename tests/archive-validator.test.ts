import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import AdmZip from 'adm-zip';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { AdmZipArchiveExtractor, ArchiveExtractionError } from '@main/services/update/ArchiveExtractor';
import { ArchiveValidator } from '@main/services/update/ArchiveValidator';

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe('ArchiveValidator', () => {
  it('aceita zip valido com checagem de integridade', async () => {
    const file = writeFile('package.zip', buildZip({ 'my-plugin/my-plugin.php': '<?php // ok' }));
    const validator = new ArchiveValidator({ integrityChecker: new AdmZipArchiveExtractor() });

    await expect(validator.validate(file, 1024 * 1024)).resolves.toEqual({ ok: true });
  });

  it('rejeita arquivo inexistente', async () => {
    const validator = new ArchiveValidator();

    const result = await validator.validate(path.join(createTempDir(), 'missing.zip'), 1024);

    expect(result).toEqual({ ok: false, code: 'file_not_found', message: 'ZIP file not found' });
  });

  it('rejeita arquivo acima do limite antes de qualquer leitura', async () => {
    const file = writeFile('big.zip', Buffer.alloc(2 * 1024 * 1024, 1));
    const sniff = vi.fn(async () => 'application/zip');
    const checkIntegrity = vi.fn(async () => undefined);
    const validator = new ArchiveValidator({ mimeSniffer: { sniff }, integrityChecker: { checkIntegrity } });

    const result = await validator.validate(file, 1024 * 1024);

    expect(result).toEqual({
      ok: false,
      code: 'file_too_large',
      message: 'Plugin file exceeds size limit of 1 MB'
    });
    expect(sniff).not.toHaveBeenCalled();
    expect(checkIntegrity).not.toHaveBeenCalled();
  });

  it('rejeita assinatura invalida mesmo com extensao .zip', async () => {
    const file = writeFile('fake.zip', Buffer.from('<html>nao e zip</html>'));
    const validator = new ArchiveValidator();

    const result = await validator.validate(file, 1024);

    expect(result).toEqual({
      ok: false,
      code: 'invalid_zip_signature',
      message: 'File does not have a valid ZIP signature'
    });
  });

  it('aceita as tres assinaturas conhecidas', async () => {
    const validator = new ArchiveValidator();
    const signatures = [
      [0x50, 0x4b, 0x03, 0x04],
      [0x50, 0x4b, 0x05, 0x06],
      [0x50, 0x4b, 0x07, 0x08]
    ];

    for (const [index, bytes] of signatures.entries()) {
      const file = writeFile(`sig-${index}.zip`, Buffer.concat([Buffer.from(bytes), Buffer.alloc(18)]));
      await expect(validator.validate(file, 1024)).resolves.toEqual({ ok: true });
    }
  });

  it('rejeita tipo MIME que nao e zip quando ha detector', async () => {
    const file = writeFile('package.zip', buildZip({ 'a.txt': 'a' }));
    const validator = new ArchiveValidator({ mimeSniffer: { sniff: async () => 'text/plain' } });

    const result = await validator.validate(file, 1024 * 1024);

    expect(result).toEqual({ ok: false, code: 'invalid_file_type', message: 'File is not a valid ZIP archive' });
  });

  it('segue para a assinatura quando o detector nao reconhece o arquivo', async () => {
    const file = writeFile('fake.zip', Buffer.from('texto'));
    const validator = new ArchiveValidator({ mimeSniffer: { sniff: async () => null } });

    const result = await validator.validate(file, 1024);

    expect(result.ok ? null : result.code).toBe('invalid_zip_signature');
  });

  it('reporta falha de integridade', async () => {
    const truncated = buildZip({ 'my-plugin/my-plugin.php': 'x'.repeat(200) }).subarray(0, 40);
    const file = writeFile('truncated.zip', truncated);
    const validator = new ArchiveValidator({ integrityChecker: new AdmZipArchiveExtractor() });

    const result = await validator.validate(file, 1024 * 1024);

    expect(result).toEqual({ ok: false, code: 'zip_integrity_failed', message: 'ZIP file integrity check failed' });
  });
});

describe('AdmZipArchiveExtractor', () => {
  it('extrai a arvore do pacote', async () => {
    const file = writeFile('package.zip', buildZip({ 'my-plugin/my-plugin.php': '<?php', 'my-plugin/README.md': '# Oi' }));
    const dest = path.join(createTempDir(), 'out');
    fs.mkdirSync(dest);

    await new AdmZipArchiveExtractor().extract(file, dest);

    expect(fs.readFileSync(path.join(dest, 'my-plugin', 'README.md'), 'utf-8')).toBe('# Oi');
  });

  it('lanca ArchiveExtractionError para arquivo que nao e zip', async () => {
    const file = writeFile('broken.zip', Buffer.from('PK\u0003\u0004quebrado'));

    await expect(new AdmZipArchiveExtractor().extract(file, createTempDir())).rejects.toBeInstanceOf(
      ArchiveExtractionError
    );
  });
});

function createTempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'updater-archive-'));
  tempDirs.push(dir);
  return dir;
}

function writeFile(name: string, content: Buffer): string {
  const file = path.join(createTempDir(), name);
  fs.writeFileSync(file, content);
  return file;
}

function buildZip(files: Record<string, string>): Buffer {
  const zip = new AdmZip();
  for (const [name, content] of Object.entries(files)) {
    zip.addFile(name, Buffer.from(content, 'utf-8'));
  }
  return zip.toBuffer();
}
