import { Tool, type ToolOptions } from './tool.js';

/** `gdcmconv`: rewrites a DICOM file, typically into another transfer syntax. */
export class Convert extends Tool {
  constructor(options?: ToolOptions) {
    super('gdcmconv', options);
  }

  /** Decompress to raw (uncompressed) pixel data. */
  raw(): this {
    return this.option('raw');
  }

  deflated(): this {
    return this.option('deflated');
  }

  jpeg(): this {
    return this.option('jpeg');
  }

  jpegls(): this {
    return this.option('jpegls');
  }

  j2k(): this {
    return this.option('j2k');
  }

  rle(): this {
    return this.option('rle');
  }

  lossy(): this {
    return this.option('lossy');
  }

  /** Lossy compression quality; only meaningful together with lossy(). */
  quality(value: number): this {
    return this.option('quality', value);
  }

  implicit(): this {
    return this.option('implicit');
  }

  explicit(): this {
    return this.option('explicit');
  }

  force(): this {
    return this.option('force');
  }
}
