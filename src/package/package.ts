// Package facade: a DICOM file on disk plus the ownership rule that decides what conversions may touch.
// Owned packages (open/read/create) live in a temp file; conversions swap in a new temp file and delete the old one.
// Unowned packages (new Package(path)) are the caller's file; conversions rewrite it in place as <name>.dcm.
import fs from 'fs/promises';
import path from 'path';
import { createReadStream, createWriteStream } from 'fs';
import type { Readable, Writable } from 'stream';
import { pipeline } from 'stream/promises';
import type { ToolkitConfig } from '../types/config.js';
import { resolveConfig } from '../config/index.js';
import { createTempFile, removeTempFile, type TempFile } from '../shared/tempfile.js';
import { CommandFailedError, InvalidPackageError } from '../shared/errors.js';
import { Convert } from '../tool/convert.js';
import { Identify } from '../tool/identify.js';
import { toValues, type OptionValue } from '../tool/tool.js';
import { PackageInfo, type PackageRef } from './info.js';
import type { MetadataMap } from './metadata-parser.js';

export interface PackageOptions {
  /** Identify the new package and reject it if GDCM cannot read it. Defaults to config.validateOnCreate. */
  validate?: boolean;
  config?: ToolkitConfig;
}

export interface OpenOptions extends PackageOptions {
  /** Extension for the temp copy. Defaults to the source file's. */
  ext?: string;
}

/** `true` adds the bare flag; `false`, `null` and `undefined` leave it out. */
export type ConvertOptionValue = OptionValue | readonly OptionValue[] | boolean | null | undefined;
export type ConvertOptions = Readonly<Record<string, ConvertOptionValue>>;

function replaceExtension(filePath: string, ext: string): string {
  const current = path.extname(filePath);
  return (current ? filePath.slice(0, -current.length) : filePath) + ext;
}

function applyOption(convert: Convert, name: string, value: ConvertOptionValue): void {
  if (value === true) {
    convert.option(name);
  } else if (value !== false && value !== null && value !== undefined) {
    convert.option(name, ...toValues(value));
  }
}

export class Package implements PackageRef {
  readonly config: ToolkitConfig;
  /** Cached gdcminfo output and dump helpers for this package. */
  readonly metadata: PackageInfo;
  private currentPath: string;
  private tempfile: TempFile | null;

  /** Wrap `filePath` as is. Without a tempfile the package is unowned and conversions modify the file itself. */
  constructor(filePath: string, tempfile: TempFile | null = null, config?: ToolkitConfig) {
    this.currentPath = filePath;
    this.tempfile = tempfile;
    this.config = resolveConfig(config);
    this.metadata = new PackageInfo(this);
  }

  /** Copy `filePath` into a new temp file; the original is never modified. */
  static async open(filePath: string, options: OpenOptions = {}): Promise<Package> {
    // extname("scan.dcm:1") is ".dcm:1"
    const ext = options.ext ?? path.extname(filePath).replace(/:.*/, '');
    return Package.create(ext, (target) => fs.copyFile(filePath, target), options);
  }

  /** Stream bytes from a buffer or readable into a new temp file. */
  static async read(source: Uint8Array | Readable, ext = '', options: PackageOptions = {}): Promise<Package> {
    return Package.create(
      ext,
      async (target) => {
        if (source instanceof Uint8Array) {
          await fs.writeFile(target, source);
        } else {
          await pipeline(source, createWriteStream(target));
        }
      },
      options
    );
  }

  /**
   * Allocate a temp file, let `writer` fill it, then validate it.
   * The temp file is removed if either step fails.
   */
  static async create(ext: string, writer: (filePath: string) => Promise<void>, options: PackageOptions = {}): Promise<Package> {
    const config = resolveConfig(options.config);
    const tempfile = await createTempFile(ext, writer);
    const pkg = new Package(tempfile.path, tempfile, config);

    if (options.validate ?? config.validateOnCreate) {
      try {
        await pkg.validate();
      } catch (err) {
        await pkg.destroy();
        throw err;
      }
    }
    return pkg;
  }

  get path(): string {
    return this.currentPath;
  }

  /** True when the package lives in a temp file it is allowed to delete. */
  get owned(): boolean {
    return this.tempfile !== null;
  }

  /**
   * Run gdcmconv from the current file to a new one and adopt the result.
   * Options are applied first, then `configure`, then the input and output paths.
   *
   * @example
   *   await pkg.convert({}, (convert) => convert.raw());
   *   await pkg.convert({ lossy: true, quality: 90, j2k: true });
   */
  async convert(options: ConvertOptions = {}, configure?: (convert: Convert) => unknown): Promise<this> {
    const inputPath = this.currentPath;
    const output = this.tempfile ? await createTempFile('.dcm') : null;
    const outputPath = output ? output.path : replaceExtension(inputPath, '.dcm');

    try {
      const convert = new Convert({ config: this.config });
      for (const [name, value] of Object.entries(options)) {
        applyOption(convert, name, value);
      }
      if (configure) await configure(convert);
      convert.arg(inputPath).arg(outputPath);
      await convert.execute();
    } catch (err) {
      if (output) await removeTempFile(output);
      throw err;
    }

    if (this.tempfile) {
      await removeTempFile(this.tempfile);
      this.tempfile = output;
    } else if (inputPath !== outputPath) {
      await fs.unlink(inputPath);
    }
    this.currentPath = outputPath;
    this.metadata.clear();
    return this;
  }

  /** Copy the current file to a path, or pipe it into a stream. The stream is left open for more writes. */
  async write(destination: string | Writable): Promise<void> {
    if (typeof destination === 'string') {
      if (path.resolve(destination) !== path.resolve(this.currentPath)) {
        await fs.copyFile(this.currentPath, destination);
      }
      return;
    }
    await pipeline(createReadStream(this.currentPath), destination, { end: false });
  }

  toBuffer(): Promise<Buffer> {
    return fs.readFile(this.currentPath);
  }

  identify(configure?: (identify: Identify) => unknown): Promise<string> {
    return this.metadata.identify(configure);
  }

  /** Throws InvalidPackageError when gdcminfo rejects the file. A missing gdcminfo or a timeout is rethrown as is. */
  async validate(): Promise<void> {
    try {
      await Identify.run((identify) => identify.arg(this.currentPath), { config: this.config, whiny: true });
    } catch (err) {
      if (err instanceof CommandFailedError) {
        throw new InvalidPackageError(this.currentPath, err);
      }
      throw err;
    }
  }

  async isValid(): Promise<boolean> {
    try {
      await this.validate();
      return true;
    } catch (err) {
      if (err instanceof InvalidPackageError) return false;
      throw err;
    }
  }

  /** Delete the temp file of an owned package. Unowned packages are left alone. */
  async destroy(): Promise<void> {
    if (this.tempfile) {
      await removeTempFile(this.tempfile);
    }
  }

  /** Parsed gdcminfo output, cached until the next conversion or metadata.clear(). */
  info(): Promise<MetadataMap | undefined> {
    return this.metadata.data();
  }
}

/** Open a package, hand it to `fn`, and delete its temp file however `fn` ends. */
export async function withPackage<T>(
  filePath: string,
  fn: (pkg: Package) => Promise<T>,
  options: OpenOptions = {}
): Promise<T> {
  const pkg = await Package.open(filePath, options);
  try {
    return await fn(pkg);
  } finally {
    await pkg.destroy();
  }
}
