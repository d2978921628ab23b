/** Keys in the order their lines appeared in the tool output. */
export type MetadataMap = Map<string, string>;

export interface DumpTag {
  /** Group and element in lower-case hex, e.g. "0008,0016". */
  tag: string;
  line: string;
}

const MEDIA_STORAGE = /^MediaStorage is ([\d.]+)/;
const TRANSFER_SYNTAX = /^TransferSyntax is ([\d.]+)/;
const KEY_VALUE_SEPARATOR = /:\s*/;
const DUMP_TAG = /^\s*\(([0-9a-f]{4},[0-9a-f]{4})\)/;

function lines(raw: string): string[] {
  return raw.split('\n').map((line) => line.replace(/\r$/, ''));
}

/**
 * Scrape `gdcminfo` output into a key/value map.
 * Returns undefined for anything that is not a non-empty string.
 *
 * @example
 *   parseMetadata('MediaStorage is 1.2.840.10008.5.1.4.1.1.2 [CT Image Storage]\nNumberOfDimensions: 2');
 *   // Map { 'MediaStorage' => '1.2.840.10008.5.1.4.1.1.2', 'NumberOfDimensions' => '2' }
 */
export function parseMetadata(raw: unknown): MetadataMap | undefined {
  if (typeof raw !== 'string' || raw.length === 0) return undefined;

  const data: MetadataMap = new Map();
  for (const line of lines(raw)) {
    if (!line.trim()) continue;

    const mediaStorage = MEDIA_STORAGE.exec(line);
    if (mediaStorage) {
      data.set('MediaStorage', mediaStorage[1]);
      continue;
    }

    const transferSyntax = TRANSFER_SYNTAX.exec(line);
    if (transferSyntax) {
      data.set('TransferSyntax', transferSyntax[1]);
      continue;
    }

    const separator = KEY_VALUE_SEPARATOR.exec(line);
    if (!separator) {
      data.set(line.trim(), '');
      continue;
    }
    data.set(line.slice(0, separator.index).trim(), line.slice(separator.index + separator[0].length).trim());
  }
  return data;
}

/** Data element lines of `gdcmdump` output, e.g. `(0010,0010) PN [DOE^JOHN]`. */
export function parseDumpTags(raw: string): DumpTag[] {
  const tags: DumpTag[] = [];
  for (const line of lines(raw)) {
    const match = DUMP_TAG.exec(line);
    if (match) tags.push({ tag: match[1], line });
  }
  return tags;
}
