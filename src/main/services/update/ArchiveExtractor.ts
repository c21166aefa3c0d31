import path from 'node:path';
import AdmZip from 'adm-zip';
import type { ArchiveIntegrityChecker } from '@main/services/update/ArchiveValidator';

export interface ArchiveExtractor {
  extract(archivePath: string, destDir: string): Promise<void>;
}

export class ArchiveExtractionError extends Error {
  constructor(
    message: string,
    readonly archivePath: string
  ) {
    super(message);
    this.name = 'ArchiveExtractionError';
  }
}

export class AdmZipArchiveExtractor implements ArchiveExtractor, ArchiveIntegrityChecker {
  async extract(archivePath: string, destDir: string): Promise<void> {
    const zip = openArchive(archivePath);
    const root = path.resolve(destDir);

    for (const entry of zip.getEntries()) {
      const target = path.resolve(root, entry.entryName);
      if (target !== root && !target.startsWith(`${root}${path.sep}`)) {
        throw new ArchiveExtractionError(`Entrada fora do diretorio de extracao: ${entry.entryName}`, archivePath);
      }
    }

    try {
      zip.extractAllTo(root, true);
    } catch (error) {
      throw new ArchiveExtractionError(error instanceof Error ? error.message : String(error), archivePath);
    }
  }

  async checkIntegrity(archivePath: string): Promise<void> {
    const zip = openArchive(archivePath);
    for (const entry of zip.getEntries()) {
      if (entry.isDirectory) {
        continue;
      }

      try {
        // descomprime e confere CRC de cada entrada
        entry.getData();
      } catch (error) {
        throw new ArchiveExtractionError(
          `Entrada corrompida ${entry.entryName}: ${error instanceof Error ? error.message : String(error)}`,
          archivePath
        );
      }
    }
  }
}

function openArchive(archivePath: string): AdmZip {
  try {
    return new AdmZip(archivePath);
  } catch (error) {
    throw new ArchiveExtractionError(error instanceof Error ? error.message : String(error), archivePath);
  }
}
