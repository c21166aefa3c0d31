export interface PackageHeader {
  name: string;
  version: string;
  testedUpTo: string;
  minimumHostVersion: string;
  minimumRuntimeVersion: string;
  author: string;
  authorUri: string;
  pluginUri: string;
}

const HEADER_FIELDS: Record<keyof PackageHeader, string> = {
  name: 'Plugin Name',
  version: 'Version',
  testedUpTo: 'Tested up to',
  minimumHostVersion: 'Requires at least',
  minimumRuntimeVersion: 'Requires PHP',
  author: 'Author',
  authorUri: 'Author URI',
  pluginUri: 'Plugin URI'
};

// o cabecalho fica no primeiro bloco de comentario do arquivo
const HEADER_SCAN_BYTES = 8 * 1024;

/**
 * Reads the `Field: value` comment header at the top of a package file.
 * Absent fields come back as empty strings.
 */
export function parsePackageHeader(content: string): PackageHeader {
  const head = content.slice(0, HEADER_SCAN_BYTES).replace(/\r\n?/g, '\n');
  const read = (field: keyof PackageHeader): string => readHeaderField(head, HEADER_FIELDS[field]);

  return {
    name: read('name'),
    version: read('version'),
    testedUpTo: read('testedUpTo'),
    minimumHostVersion: read('minimumHostVersion'),
    minimumRuntimeVersion: read('minimumRuntimeVersion'),
    author: read('author'),
    authorUri: read('authorUri'),
    pluginUri: read('pluginUri')
  };
}

function readHeaderField(content: string, label: string): string {
  const pattern = new RegExp(`^[ \\t/*#@]*${escapeRegExp(label)}:(.*)$`, 'mi');
  const match = content.match(pattern);
  if (!match || match[1] === undefined) {
    return '';
  }

  return cleanHeaderValue(match[1]);
}

function cleanHeaderValue(value: string): string {
  return value.replace(/\s*(?:\*\/|\?>).*$/, '').trim();
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
