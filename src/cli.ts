#!/usr/bin/env node
import { execFileSync } from 'child_process';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConversionError } from './errors';
import { parseFrontmatter } from './frontmatter';
import type { Metadata } from './frontmatter';
import { convertMdToDocx, formatWarning, readMarkdownFile, writeDocxFile } from './md-to-docx';

export interface CliOptions {
  help: boolean;
  version: boolean;
  inputPath: string;
  outputPath?: string;
  force: boolean;
  authorName?: string;
  title?: string;
  metadata: Metadata;
}

export function parseArgs(argv: string[]): CliOptions {
  const args = argv.slice(2);
  const options: CliOptions = {
    help: false,
    version: false,
    inputPath: '',
    force: false,
    metadata: {},
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const requireValue = (flag: string): string => {
      if (i + 1 >= args.length || args[i + 1].startsWith('--')) {
        throw new Error(`${flag} requires a value`);
      }
      i++;
      return args[i];
    };

    if (arg === '--help') {
      options.help = true;
    } else if (arg === '--version') {
      options.version = true;
    } else if (arg === '--force') {
      options.force = true;
    } else if (arg === '--output') {
      options.outputPath = requireValue('--output');
    } else if (arg === '--author') {
      options.authorName = requireValue('--author');
    } else if (arg === '--title') {
      options.title = requireValue('--title');
    } else if (arg === '--meta') {
      const entry = requireValue('--meta');
      const eq = entry.indexOf('=');
      if (eq <= 0) {
        throw new Error(`Invalid metadata "${entry}". Use --meta key=value`);
      }
      options.metadata[entry.slice(0, eq).trim()] = entry.slice(eq + 1);
    } else if (arg.startsWith('--')) {
      throw new Error(`Unknown option "${arg}"`);
    } else if (!options.inputPath) {
      options.inputPath = arg;
    } else {
      throw new Error(`Unexpected argument "${arg}"`);
    }
  }

  if (!options.help && !options.version && !options.inputPath) {
    throw new Error('No input file specified');
  }

  return options;
}

function showHelp() {
  console.log(`Usage: md2docx <input.md> [options]

Convert a markdown document to a Word document (.docx).

Options:
  --help                Show this help message
  --version             Show version number
  --output <path>       Output file path (default: input path with .docx extension)
  --force               Overwrite an existing output file
  --author <name>       Author name (default: git user.name, then OS username)
  --title <title>       Document title (default: front matter title, then first H1)
  --meta <key=value>    Extra document property; may be repeated`);
}

function showVersion() {
  const pkg: unknown = require('../package.json');
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    console.log(pkg.version);
  }
}

export function deriveMdToDocxPath(inputPath: string, outputPath?: string): string {
  if (outputPath) return outputPath;
  const inputDir = path.dirname(inputPath);
  const ext = path.extname(inputPath);
  const inputBase = path.basename(inputPath, ext);
  return path.join(inputDir, inputBase + '.docx');
}

/** `git config user.name`, or undefined when git is missing or has no name configured. */
export function gitUserName(): string | undefined {
  try {
    const name = execFileSync('git', ['config', 'user.name'], { encoding: 'utf8', stdio: ['ignore', 'pipe', 'ignore'] }).trim();
    return name || undefined;
  } catch {
    return undefined;
  }
}

export function resolveAuthor(authorFlag?: string): string {
  if (authorFlag) return authorFlag;
  const gitName = gitUserName();
  if (gitName) return gitName;
  try {
    return os.userInfo().username;
  } catch {
    return process.env.USER ?? process.env.USERNAME ?? '';
  }
}

export function assertNoMdToDocxConflict(docxPath: string, force: boolean) {
  if (!force && fs.existsSync(docxPath)) {
    throw new Error(`Output file already exists: ${docxPath}\nUse --force to overwrite`);
  }
}

async function runMdToDocx(options: CliOptions) {
  const markdown = await readMarkdownFile(options.inputPath);

  const docxPath = deriveMdToDocxPath(options.inputPath, options.outputPath);
  assertNoMdToDocxConflict(docxPath, options.force);

  // Flags override front matter; the git/OS author only fills a gap.
  const metadata: Metadata = { ...options.metadata };
  if (options.title) metadata.title = options.title;
  if (options.authorName) {
    metadata.author = options.authorName;
  } else if (!metadata.author && !parseFrontmatter(markdown).metadata.author) {
    const author = resolveAuthor();
    if (author) metadata.author = author;
  }

  const result = await convertMdToDocx(markdown, { metadata });
  await writeDocxFile(docxPath, result.docx);
  console.log(docxPath);

  for (const warning of result.warnings) {
    console.error(`Warning: ${formatWarning(warning)}`);
  }
}

export async function main(argv: string[] = process.argv) {
  const options = parseArgs(argv);

  if (options.help) {
    showHelp();
    return;
  }

  if (options.version) {
    showVersion();
    return;
  }

  await runMdToDocx(options);
}

export function describeFailure(error: unknown): string {
  if (error instanceof ConversionError) return `Error [${error.reason}]: ${error.message}`;
  return error instanceof Error ? error.message : String(error);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(describeFailure(error));
    process.exit(1);
  });
}
