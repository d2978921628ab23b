import { Tool, type ToolOptions } from './tool.js';

/** `gdcminfo`: prints a summary of a DICOM file, fails on files GDCM cannot read. */
export class Identify extends Tool {
  constructor(options?: ToolOptions) {
    super('gdcminfo', options);
  }

  recursive(): this {
    return this.option('recursive');
  }

  md5sum(): this {
    return this.option('md5sum');
  }

  checkCompression(): this {
    return this.option('check_compression');
  }
}
