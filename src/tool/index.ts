export { Tool, toFlag, toValues, chompNewline } from './tool.js';
export type { OptionValue, StackChild, ToolOptions, ExecuteOptions } from './tool.js';
export { Convert } from './convert.js';
export { Identify } from './identify.js';
export { Dump } from './dump.js';
