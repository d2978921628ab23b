import type { ExecutionResult, StdinPayload } from '../types/command.js';
import type { ToolkitConfig } from '../types/config.js';
import { resolveConfig } from '../config/index.js';
import { Shell } from '../execution/shell.js';
import { StateError } from '../shared/errors.js';

export type OptionValue = string | number;

/** A stack child: a raw token, or option names mapped to their value(s). */
export type StackChild = string | Readonly<Record<string, OptionValue | readonly OptionValue[]>>;

export interface ToolOptions {
  /** Throw on non-zero exit. Defaults to config.whiny. */
  whiny?: boolean;
  config?: ToolkitConfig;
}

export interface ExecuteOptions {
  whiny?: boolean;
  stdin?: StdinPayload;
  timeoutMs?: number | null;
}

// Leading dashes of a named flag; a lone "-" is the stdin/stdout pseudo-file, not a flag.
const FLAG_PREFIX = /^-+(?=[^-])/;

/** `snake_case` option name → `--snake-case` flag. */
export function toFlag(name: string): string {
  return `--${name.replace(/_/g, '-')}`;
}

export function toValues(value: OptionValue | readonly OptionValue[]): readonly OptionValue[] {
  return typeof value === 'string' || typeof value === 'number' ? [value] : value;
}

/** Drop exactly one trailing newline, if present. */
export function chompNewline(text: string): string {
  return text.endsWith('\n') ? text.slice(0, -1) : text;
}

/**
 * Builds the argument list for one GDCM command-line tool and runs it.
 * Don't instantiate directly; use Convert, Identify or Dump.
 *
 * Two entry points:
 * - `Identify.build()` (or `new Identify()`) returns the builder for you to run later.
 * - `Identify.run((b) => b.version())` configures, executes and resolves to stdout.
 *
 * Flags without a typed helper still go through `option()`:
 *
 * @example
 *   const convert = new Convert();
 *   convert.option('remove_private_tags').arg('in.dcm').arg('out.dcm');
 *   convert.command; // ['gdcmconv', '--remove-private-tags', 'in.dcm', 'out.dcm']
 */
export abstract class Tool {
  readonly name: string;
  readonly args: string[] = [];
  protected readonly whiny: boolean;
  protected readonly config: ToolkitConfig;

  constructor(name: string, options: ToolOptions = {}) {
    this.name = name;
    this.config = resolveConfig(options.config);
    this.whiny = options.whiny ?? this.config.whiny;
  }

  static build<T extends Tool>(this: new (options?: ToolOptions) => T, options?: ToolOptions): T {
    return new this(options);
  }

  static async run<T extends Tool>(
    this: new (options?: ToolOptions) => T,
    configure: (tool: T) => unknown,
    options?: ToolOptions
  ): Promise<string> {
    const tool = new this(options);
    await configure(tool);
    return tool.execute();
  }

  /** The built-up command, executable first. */
  get command(): string[] {
    return [this.name, ...this.args];
  }

  /** Append one token verbatim (file paths, values). */
  arg(token: OptionValue): this {
    this.args.push(String(token));
    return this;
  }

  merge(tokens: Iterable<OptionValue>): this {
    for (const token of tokens) this.arg(token);
    return this;
  }

  option(name: string, ...values: OptionValue[]): this {
    this.args.push(toFlag(name));
    return this.merge(values);
  }

  /**
   * Turn the last flag into its "plus" form, then append `values`.
   *
   * @example
   *   tool.option('antialias').plus(); // ... +antialias
   */
  plus(...values: OptionValue[]): this {
    const last = this.args.length - 1;
    if (last < 0 || !FLAG_PREFIX.test(this.args[last])) {
      throw new StateError('plus() needs a flag as the last token', {
        lastToken: last < 0 ? null : this.args[last],
      });
    }
    this.args[last] = this.args[last].replace(FLAG_PREFIX, '+');
    return this.merge(values);
  }

  /**
   * Group tokens between `(` and `)`. A trailing function receives this tool
   * to append more tokens inside the group.
   *
   * @example
   *   convert.arg('1.dcm').stack('2.dcm', { rotate: 30 }).arg('3.dcm');
   *   // gdcmconv 1.dcm ( 2.dcm --rotate 30 ) 3.dcm
   */
  stack(...items: Array<StackChild | ((tool: this) => void)>): this {
    this.arg('(');
    for (const item of items) {
      if (typeof item === 'string') {
        this.arg(item);
      } else if (typeof item === 'function') {
        item(this);
      } else {
        for (const [name, value] of Object.entries(item)) {
          this.option(name, ...toValues(value));
        }
      }
    }
    return this.arg(')');
  }

  /** Pseudo-filename `-`: read the input from standard input. */
  stdin(): this {
    return this.arg('-');
  }

  /** Pseudo-filename `-`: write the output to standard output. */
  stdout(): this {
    return this.arg('-');
  }

  help(): this {
    return this.option('help');
  }

  version(): this {
    return this.option('version');
  }

  verbose(): this {
    return this.option('verbose');
  }

  /** Run the command and resolve to its stdout, minus one trailing newline. */
  async execute(options: ExecuteOptions = {}): Promise<string> {
    const result = await this.spawn(options, true);
    return chompNewline(result.stdout);
  }

  /** Run the command and resolve to the whole result. Stderr is returned, not logged. */
  async capture(options: ExecuteOptions = {}): Promise<ExecutionResult> {
    return this.spawn(options, false);
  }

  private spawn(options: ExecuteOptions, logStderr: boolean): Promise<ExecutionResult> {
    return new Shell(this.config).run(this.command, {
      stdin: options.stdin,
      timeoutMs: options.timeoutMs,
      whiny: options.whiny ?? this.whiny,
      stderr: logStderr,
    });
  }
}
