import { z } from 'zod';

const optionalText = z.string().optional().catch(undefined);
const stringMap = z.record(z.string(), z.unknown()).optional().catch(undefined);

const packageJsonSchema = z
  .object({
    name: optionalText,
    slug: optionalText,
    version: optionalText,
    tested: optionalText,
    requires: optionalText,
    requires_php: optionalText,
    author: optionalText,
    author_profile: optionalText,
    last_updated: optionalText,
    download_link: optionalText,
    trunk: optionalText,
    upgrade_notice: optionalText,
    sections: stringMap,
    banners: stringMap,
    icons: stringMap
  })
  .passthrough();

export interface PackageJsonMetadata {
  name: string;
  slug: string;
  version: string;
  tested?: string;
  requires?: string;
  requires_php?: string;
  author?: string;
  author_profile?: string;
  last_updated?: string;
  download_link?: string;
  trunk?: string;
  upgrade_notice?: string;
  sections: Record<string, string>;
  banners: Record<string, string>;
  icons: Record<string, string>;
}

export type PackageJsonValidation =
  | { ok: true; metadata: PackageJsonMetadata }
  | { ok: false; error: string; missingFields: string[]; availableFields: string[] };

const REQUIRED_FIELDS = ['name', 'version', 'slug'] as const;

/** Validates a published `plugin.json`; name, version and slug must be non-empty. */
export class PackageJsonMetadataValidator {
  validate(input: unknown): PackageJsonValidation {
    if (!input || typeof input !== 'object' || Array.isArray(input)) {
      return { ok: false, error: 'plugin.json precisa ser um objeto JSON', missingFields: [], availableFields: [] };
    }

    const availableFields = Object.keys(input);
    if (availableFields.length === 0) {
      return { ok: false, error: 'plugin.json vazio', missingFields: [], availableFields };
    }

    const parsed = packageJsonSchema.safeParse(input);
    if (!parsed.success) {
      return {
        ok: false,
        error: parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; '),
        missingFields: [],
        availableFields
      };
    }

    const data = parsed.data;
    const name = data.name?.trim() ?? '';
    const version = data.version?.trim() ?? '';
    const slug = data.slug?.trim() ?? '';
    const present: Record<(typeof REQUIRED_FIELDS)[number], string> = { name, version, slug };
    const missingFields = REQUIRED_FIELDS.filter((field) => !present[field]);
    if (missingFields.length > 0) {
      return {
        ok: false,
        error: `Campos obrigatorios ausentes: ${missingFields.join(', ')}`,
        missingFields,
        availableFields
      };
    }

    return {
      ok: true,
      metadata: {
        name,
        slug,
        version,
        tested: data.tested,
        requires: data.requires,
        requires_php: data.requires_php,
        author: data.author,
        author_profile: data.author_profile,
        last_updated: data.last_updated,
        download_link: data.download_link,
        trunk: data.trunk,
        upgrade_notice: data.upgrade_notice,
        sections: onlyStrings(data.sections),
        banners: onlyStrings(data.banners),
        icons: onlyStrings(data.icons)
      }
    };
  }
}

function onlyStrings(input: Record<string, unknown> | undefined): Record<string, string> {
  const result: Record<string, string> = {};
  if (!input) {
    return result;
  }

  for (const [key, value] of Object.entries(input)) {
    if (typeof value === 'string') {
      result[key] = value;
    }
  }

  return result;
}
