import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { SanitizeHtmlSanitizer } from '@main/services/update/HtmlSanitizer';
import { readSections } from '@main/services/update/SectionReader';

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe('readSections', () => {
  it('renderiza markdown e sanitiza o resultado', async () => {
    const dir = createPackageDir({
      'description.md': '# Minha extensao\n\nTexto **forte**.\n\n<script>alert(1)</script>',
      'changelog.txt': '= 1.4.0 =\n<script>alert(1)</script>Corrigido'
    });

    const sections = await readSections(dir, new SanitizeHtmlSanitizer());

    expect(Object.keys(sections).sort()).toEqual(['changelog', 'description']);
    expect(sections.description).toContain('<h1>Minha extensao</h1>');
    expect(sections.description).toContain('<strong>forte</strong>');
    expect(sections.description).not.toContain('script');
    expect(sections.changelog).toBe('= 1.4.0 =\nCorrigido');
  });

  it('usa o primeiro candidato nao vazio e ignora maiusculas', async () => {
    const dir = createPackageDir({
      'DESCRIPTION.TXT': '   \n',
      'readme.md': 'Descricao do readme',
      'Faq.md': 'Perguntas'
    });

    const sections = await readSections(dir, new SanitizeHtmlSanitizer());

    expect(sections.description).toBe('<p>Descricao do readme</p>');
    expect(sections.faq).toBe('<p>Perguntas</p>');
  });

  it('retorna vazio quando o diretorio nao existe', async () => {
    const sections = await readSections(path.join(os.tmpdir(), 'updater-sections-inexistente'), new SanitizeHtmlSanitizer());

    expect(sections).toEqual({});
  });
});

function createPackageDir(files: Record<string, string>): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'updater-sections-'));
  tempDirs.push(dir);
  for (const [name, content] of Object.entries(files)) {
    fs.writeFileSync(path.join(dir, name), content, 'utf-8');
  }
  return dir;
}
