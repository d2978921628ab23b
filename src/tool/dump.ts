import { Tool, type ToolOptions } from './tool.js';

/** `gdcmdump`: prints every data element of a DICOM file. */
export class Dump extends Tool {
  constructor(options?: ToolOptions) {
    super('gdcmdump', options);
  }

  print(): this {
    return this.option('print');
  }

  /** Decode Siemens CSA headers. */
  csa(): this {
    return this.option('csa');
  }

  /** Decode GE private data blocks. */
  pdb(): this {
    return this.option('pdb');
  }
}
