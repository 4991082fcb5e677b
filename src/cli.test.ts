import { afterEach, beforeEach, describe, test, expect, jest } from '@jest/globals';
import * as fc from 'fast-check';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  assertNoMdToDocxConflict,
  deriveMdToDocxPath,
  describeFailure,
  main,
  parseArgs,
  resolveAuthor,
} from './cli';
import { ConversionError } from './errors';
import { requirePart, unzipParts } from './test-helpers';

const argv = (...args: string[]) => ['node', 'md2docx', ...args];

describe('parseArgs', () => {
  test('input path with every option', () => {
    expect(parseArgs(argv('notes.md', '--output', 'out.docx', '--force', '--author', 'A', '--title', 'T', '--meta', 'project=x=y'))).toEqual({
      help: false,
      version: false,
      inputPath: 'notes.md',
      outputPath: 'out.docx',
      force: true,
      authorName: 'A',
      title: 'T',
      metadata: { project: 'x=y' },
    });
  });

  test('--help and --version need no input', () => {
    expect(parseArgs(argv('--help')).help).toBe(true);
    expect(parseArgs(argv('--version')).version).toBe(true);
  });

  test('usage errors', () => {
    expect(() => parseArgs(argv())).toThrow('No input file specified');
    expect(() => parseArgs(argv('a.md', 'b.md'))).toThrow('Unexpected argument "b.md"');
    expect(() => parseArgs(argv('a.md', '--bogus'))).toThrow('Unknown option "--bogus"');
    expect(() => parseArgs(argv('a.md', '--output'))).toThrow('--output requires a value');
    expect(() => parseArgs(argv('a.md', '--author', '--force'))).toThrow('--author requires a value');
    expect(() => parseArgs(argv('a.md', '--meta', '=v'))).toThrow('Invalid metadata "=v". Use --meta key=value');
  });
});

describe('deriveMdToDocxPath', () => {
  test('replaces the extension', () => {
    fc.assert(
      fc.property(
        fc.string({ minLength: 1, maxLength: 20 }).filter(s => !s.includes('/') && !s.includes('.')),
        (name) => {
          expect(deriveMdToDocxPath('/tmp/' + name + '.md')).toBe('/tmp/' + name + '.docx');
        }
      ),
      { numRuns: 100 }
    );
  });

  test('an explicit output path wins', () => {
    expect(deriveMdToDocxPath('/tmp/a.md', '/other/b.docx')).toBe('/other/b.docx');
  });
});

test('resolveAuthor prefers the flag', () => {
  expect(resolveAuthor('Flag Name')).toBe('Flag Name');
});

test('describeFailure names the failure reason', () => {
  expect(describeFailure(new ConversionError('InputUnreadable', 'bad bytes'))).toBe('Error [InputUnreadable]: bad bytes');
  expect(describeFailure(new Error('plain'))).toBe('plain');
  expect(describeFailure('text')).toBe('text');
});

describe('main', () => {
  let dir: string;
  let logged: string[];
  let errors: string[];

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'md2docx-cli-'));
    logged = [];
    errors = [];
    jest.spyOn(console, 'log').mockImplementation((message: unknown) => { logged.push(String(message)); });
    jest.spyOn(console, 'error').mockImplementation((message: unknown) => { errors.push(String(message)); });
  });

  afterEach(() => {
    jest.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('converts a file and reports warnings', async () => {
    const input = path.join(dir, 'doc.md');
    fs.writeFileSync(input, '---\nauthor: Tester\n---\n# Doc\n\n####### Deep');
    await main(argv(input));

    const output = path.join(dir, 'doc.docx');
    expect(logged).toEqual([output]);
    expect(errors).toEqual(['Warning: line 6: Heading level 7 clamped to 6']);
    const core = requirePart(await unzipParts(fs.readFileSync(output)), 'docProps/core.xml');
    expect(core).toContain('<dc:title>Doc</dc:title>');
    expect(core).toContain('<dc:creator>Tester</dc:creator>');
  });

  test('refuses to overwrite without --force', async () => {
    const input = path.join(dir, 'doc.md');
    const output = path.join(dir, 'doc.docx');
    fs.writeFileSync(input, 'text');
    fs.writeFileSync(output, 'existing');
    await expect(main(argv(input, '--author', 'A'))).rejects.toThrow(`Output file already exists: ${output}\nUse --force to overwrite`);
    expect(fs.readFileSync(output, 'utf8')).toBe('existing');

    await main(argv(input, '--author', 'A', '--force'));
    expect(fs.readFileSync(output).subarray(0, 2).toString('latin1')).toBe('PK');
  });

  test('the author flag overrides front matter', async () => {
    const input = path.join(dir, 'doc.md');
    const output = path.join(dir, 'custom.docx');
    fs.writeFileSync(input, '---\nauthor: From File\n---\nBody');
    await main(argv(input, '--author', 'From Flag', '--output', output));
    const core = requirePart(await unzipParts(fs.readFileSync(output)), 'docProps/core.xml');
    expect(core).toContain('<dc:creator>From Flag</dc:creator>');
  });
});

test('assertNoMdToDocxConflict allows missing files', () => {
  expect(() => assertNoMdToDocxConflict(path.join(os.tmpdir(), 'md2docx-surely-absent.docx'), false)).not.toThrow();
});
