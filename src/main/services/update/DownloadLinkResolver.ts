import type { RawRelease } from '@shared/contracts';

const VERSION_TOKEN = /\d+(\.\d+)+/;

/**
 * Picks the installable archive among the release assets. Fixed names win over
 * names derived from the tag version; an empty string means nothing matched.
 */
export function resolveDownloadLink(release: Pick<RawRelease, 'tagName' | 'assets'>, slug: string): string {
  const assets = release.assets.map((asset) => ({
    name: asset.name.toLowerCase(),
    downloadUrl: asset.downloadUrl
  }));

  const find = (candidates: string[]): string | null => {
    for (const candidate of candidates) {
      const match = assets.find((asset) => asset.name === candidate.toLowerCase());
      if (match) {
        return match.downloadUrl;
      }
    }
    return null;
  };

  const fixed = find([`${slug}.zip`, 'latest.zip', 'plugin.zip']);
  if (fixed !== null) {
    return fixed;
  }

  const version = extractVersionToken(release.tagName);
  if (!version) {
    return '';
  }

  // assets costumam carregar a tag inteira (`v2.1.0.zip`), nao so o token numerico
  const candidates = [`${slug}-${version}.zip`, `${version}.zip`];
  const tag = release.tagName.trim();
  if (tag && tag !== version) {
    candidates.push(`${slug}-${tag}.zip`, `${tag}.zip`);
  }

  return find(candidates) ?? '';
}

export function extractVersionToken(tagName: string): string | null {
  const match = tagName.match(VERSION_TOKEN);
  return match ? match[0] : null;
}
