import { Convert } from '../../../src/tool/convert.js';
import { Identify } from '../../../src/tool/identify.js';
import { Dump } from '../../../src/tool/dump.js';
import { chompNewline, toFlag } from '../../../src/tool/tool.js';
import { CommandFailedError, StateError } from '../../../src/shared/errors.js';
import { FakeBackend, testConfig } from '../../support/fake-backend.js';

describe('toFlag', () => {
  it.each([
    ['raw', '--raw'],
    ['remove_private_tags', '--remove-private-tags'],
    ['check_compression', '--check-compression'],
    ['a__b', '--a--b'],
  ])('maps %s to %s', (name, flag) => {
    expect(toFlag(name)).toBe(flag);
  });
});

describe('chompNewline', () => {
  it('drops exactly one trailing newline', () => {
    expect(chompNewline('out\n')).toBe('out');
    expect(chompNewline('out\n\n')).toBe('out\n');
    expect(chompNewline('out')).toBe('out');
    expect(chompNewline('out\r\n')).toBe('out\r');
    expect(chompNewline('')).toBe('');
  });
});

describe('command building', () => {
  it('starts with the executable of each tool', () => {
    expect(new Convert().command).toEqual(['gdcmconv']);
    expect(new Identify().command).toEqual(['gdcminfo']);
    expect(new Dump().command).toEqual(['gdcmdump']);
  });

  it('turns any option name into a flag followed by its values', () => {
    const convert = new Convert().option('remove_private_tags').option('root_uid', '1.2.3').option('window', 40, 400);
    expect(convert.command).toEqual(['gdcmconv', '--remove-private-tags', '--root-uid', '1.2.3', '--window', '40', '400']);
  });

  it('keeps tokens in call order without de-duplication', () => {
    const identify = new Identify().arg('b.dcm').arg('a.dcm').arg('b.dcm').merge(['c.dcm', 7]);
    expect(identify.args).toEqual(['b.dcm', 'a.dcm', 'b.dcm', 'c.dcm', '7']);
  });

  it('routes typed helpers through option()', () => {
    const convert = new Convert().raw().lossy().quality(90).j2k();
    expect(convert.args).toEqual(['--raw', '--lossy', '--quality', '90', '--j2k']);
    expect(new Identify().checkCompression().md5sum().args).toEqual(['--check-compression', '--md5sum']);
    expect(new Dump().csa().print().args).toEqual(['--csa', '--print']);
  });

  it('adds the - pseudo-filename for stdin and stdout', () => {
    expect(new Convert().stdin().stdout().args).toEqual(['-', '-']);
  });
});

describe('stack', () => {
  it('wraps strings, option maps and callback tokens in parentheses', () => {
    const convert = new Convert()
      .arg('1.dcm')
      .stack('2.dcm', { rotate: 30 }, (inner) => inner.option('foo_bar'))
      .arg('3.dcm');
    expect(convert.command).toEqual(['gdcmconv', '1.dcm', '(', '2.dcm', '--rotate', '30', '--foo-bar', ')', '3.dcm']);
  });

  it('expands list values of an option map', () => {
    expect(new Convert().stack({ size: [64, 64] }).args).toEqual(['(', '--size', '64', '64', ')']);
  });

  it('emits an empty group with no children', () => {
    expect(new Convert().stack().args).toEqual(['(', ')']);
  });
});

describe('plus', () => {
  it('turns the last flag into its plus form', () => {
    expect(new Convert().option('antialias').plus().args).toEqual(['+antialias']);
  });

  it('appends values after the promoted flag', () => {
    const convert = new Convert().option('distort').plus('Perspective', '0,0,4,5 89,0,45,46');
    expect(convert.args).toEqual(['+distort', 'Perspective', '0,0,4,5 89,0,45,46']);
  });

  it('replaces a single-dash prefix as well', () => {
    expect(new Convert().arg('-append').plus().args).toEqual(['+append']);
  });

  it('throws StateError when there is no token yet', () => {
    expect(() => new Convert().plus()).toThrow(StateError);
  });

  it('throws StateError when the last token is not a flag', () => {
    expect(() => new Convert().arg('in.dcm').plus()).toThrow(StateError);
    expect(() => new Convert().stdin().plus()).toThrow(StateError);
  });
});

describe('execution', () => {
  let backend: FakeBackend;

  beforeEach(() => {
    backend = new FakeBackend();
  });

  it('passes [executable, ...tokens] to the backend verbatim', async () => {
    const config = testConfig(backend);
    await new Convert({ config }).raw().arg('my scan; rm -rf *.dcm').arg('$(out).dcm').execute();
    expect(backend.commands()).toEqual([['gdcmconv', '--raw', 'my scan; rm -rf *.dcm', '$(out).dcm']]);
  });

  it('resolves to stdout minus one trailing newline', async () => {
    backend.respond(() => ({ stdout: 'gdcminfo 3.0.22\n\n' }));
    const output = await new Identify({ config: testConfig(backend) }).version().execute();
    expect(output).toBe('gdcminfo 3.0.22\n');
  });

  it('build() returns the builder and run() returns the output', async () => {
    backend.respond(() => ({ stdout: 'usage\n' }));
    const config = testConfig(backend);

    const identify = Identify.build({ config });
    expect(identify).toBeInstanceOf(Identify);
    expect(backend.calls).toHaveLength(0);

    await expect(Identify.run((b) => b.help(), { config })).resolves.toBe('usage');
    expect(backend.commands()).toEqual([['gdcminfo', '--help']]);
  });

  it('run() awaits an async configure callback', async () => {
    const config = testConfig(backend);
    await Convert.run(
      async (convert) => {
        await Promise.resolve();
        convert.raw();
      },
      { config }
    );
    expect(backend.commands()).toEqual([['gdcmconv', '--raw']]);
  });

  it('throws CommandFailedError on non-zero exit by default', async () => {
    backend.respond(() => ({ exitCode: 1, stderr: 'usage: gdcminfo [options] file\n' }));
    const err = await Identify.run((b) => b.help(), { config: testConfig(backend) }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(CommandFailedError);
    expect(err).toMatchObject({ exitCode: 1, stderr: 'usage: gdcminfo [options] file\n' });
  });

  it('returns normally with whiny: false and exposes the exit code through capture()', async () => {
    backend.respond(() => ({ exitCode: 1, stdout: 'usage\n' }));
    const config = testConfig(backend);

    await expect(Identify.run((b) => b.help(), { config, whiny: false })).resolves.toBe('usage');

    const result = await new Identify({ config, whiny: false }).help().capture();
    expect(result.exitCode).toBe(1);
    expect(result.stdout).toBe('usage\n');
  });

  it('lets execute() override the tool whiny setting', async () => {
    backend.respond(() => ({ exitCode: 2 }));
    const identify = new Identify({ config: testConfig(backend, { whiny: false }) });
    await expect(identify.execute({ whiny: true })).rejects.toBeInstanceOf(CommandFailedError);
    await expect(identify.execute()).resolves.toBe('');
  });

  it('forwards stdin and the configured timeout', async () => {
    const config = testConfig(backend, { timeoutMs: 5_000 });
    await new Identify({ config }).stdin().execute({ stdin: 'DICM' });
    await new Identify({ config }).execute({ timeoutMs: null });

    expect(backend.calls[0].options).toEqual({ stdin: 'DICM', timeoutMs: 5_000 });
    expect(backend.calls[1].options).toEqual({ stdin: undefined, timeoutMs: null });
  });
});
