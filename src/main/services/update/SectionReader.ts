import fs from 'node:fs';
import path from 'node:path';
import type { MetadataSections } from '@shared/contracts';
import { renderMarkdown, type HtmlSanitizer } from '@main/services/update/HtmlSanitizer';

export const SECTION_CANDIDATES: Readonly<Record<string, readonly string[]>> = {
  description: ['description.md', 'description.txt', 'README.md'],
  installation: ['installation.md', 'installation.txt', 'INSTALL.md'],
  faq: ['faq.md', 'faq.txt', 'FAQ.md'],
  changelog: ['changelog.md', 'changelog.txt', 'CHANGELOG.md', 'CHANGES.md'],
  screenshots: ['screenshots.md', 'screenshots.txt'],
  other_notes: ['notes.md', 'notes.txt', 'NOTES.md']
};

/**
 * Collects section files from the package directory. File names match
 * case-insensitively and the first candidate with non-blank content wins.
 */
export async function readSections(packageDir: string, sanitizer: HtmlSanitizer): Promise<MetadataSections> {
  let files: string[];
  try {
    files = await fs.promises.readdir(packageDir);
  } catch {
    return {};
  }

  const byLowerName = new Map<string, string>();
  for (const file of files) {
    const lower = file.toLowerCase();
    if (!byLowerName.has(lower)) {
      byLowerName.set(lower, file);
    }
  }

  const sections: MetadataSections = {};
  for (const [section, candidates] of Object.entries(SECTION_CANDIDATES)) {
    for (const candidate of candidates) {
      const actual = byLowerName.get(candidate.toLowerCase());
      if (!actual) {
        continue;
      }

      const content = await readTextFile(path.join(packageDir, actual));
      if (!content || !content.trim()) {
        continue;
      }

      sections[section] = formatSection(content, actual, sanitizer);
      break;
    }
  }

  return sections;
}

export function formatSection(content: string, fileName: string, sanitizer: HtmlSanitizer): string {
  const trimmed = content.trim();
  const html = fileName.toLowerCase().endsWith('.md') ? renderMarkdown(trimmed) : trimmed;
  return sanitizer.sanitize(html);
}

async function readTextFile(filePath: string): Promise<string | null> {
  try {
    const stats = await fs.promises.stat(filePath);
    if (!stats.isFile()) {
      return null;
    }
    return await fs.promises.readFile(filePath, 'utf-8');
  } catch {
    return null;
  }
}
