import type { ToolkitConfig } from '../types/config.js';
import { Identify } from '../tool/identify.js';
import { Dump } from '../tool/dump.js';
import { parseDumpTags, parseMetadata, type DumpTag, type MetadataMap } from './metadata-parser.js';

/** What PackageInfo needs from the package it describes. */
export interface PackageRef {
  readonly path: string;
  readonly config: ToolkitConfig;
}

/**
 * Metadata of one package. `gdcminfo` output is cached until clear() is called;
 * `gdcmdump` output is fetched on every call.
 */
export class PackageInfo {
  private cachedMeta: string | null = null;

  constructor(private readonly base: PackageRef) {}

  async meta(): Promise<string> {
    if (this.cachedMeta === null) {
      this.cachedMeta = await this.identify();
    }
    return this.cachedMeta;
  }

  setMeta(value: string | null): void {
    this.cachedMeta = value;
  }

  clear(): void {
    this.cachedMeta = null;
  }

  async data(): Promise<MetadataMap | undefined> {
    return parseMetadata(await this.meta());
  }

  async tags(configure?: (dump: Dump) => unknown): Promise<DumpTag[]> {
    return parseDumpTags(await this.dump(configure));
  }

  dump(configure?: (dump: Dump) => unknown): Promise<string> {
    return Dump.run(
      async (dump) => {
        if (configure) await configure(dump);
        dump.arg(this.base.path);
      },
      { config: this.base.config }
    );
  }

  identify(configure?: (identify: Identify) => unknown): Promise<string> {
    return Identify.run(
      async (identify) => {
        if (configure) await configure(identify);
        identify.arg(this.base.path);
      },
      { config: this.base.config }
    );
  }
}
