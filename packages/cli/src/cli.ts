// ============================================================================
// @bytepair/cli: Byte-pair encoding on the command line
// ============================================================================
// Commands:
//   bytepair train   <corpus> [--merges N | --vocab-size V] [--out F]  → merges JSON
//   bytepair encode  <model.json> (--text T | --file F) [--json]      → token ids
//   bytepair decode  <model.json> <id...> [--hex]                     → text / bytes
//   bytepair stats   <model.json> <file> [--compare cl100k_base]      → compression stats
//   bytepair vocab   <model.json> [--limit N]                         → learned tokens
//   bytepair inspect <model.json>                                     → table summary
// ============================================================================

import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import path from 'node:path';
import {
  BYTE_VOCAB_SIZE,
  BpeTokenizer,
  BpeValidationError,
  ReferenceTokenizer,
  type TrainTarget,
  loadConfig,
  mergeTableHash,
  resolveReferenceEncoding,
  setLogLevel,
  timer,
} from '@bytepair/core';

const args = process.argv.slice(2);
const command = args[0];

function getFlag(name: string): string | undefined {
  const idx = args.indexOf(`--${name}`);
  if (idx !== -1 && idx + 1 < args.length) return args[idx + 1];
  return undefined;
}

function hasFlag(name: string): boolean {
  return args.includes(`--${name}`);
}

/** Positional arguments after the command, skipping flags and their values. */
function positionals(): string[] {
  const out: string[] = [];
  for (let i = 1; i < args.length; i++) {
    if (args[i].startsWith('--')) {
      if (VALUE_FLAGS.has(args[i].slice(2))) i++;
      continue;
    }
    out.push(args[i]);
  }
  return out;
}

const VALUE_FLAGS = new Set(['merges', 'vocab-size', 'out', 'text', 'file', 'compare', 'limit']);

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

function supportsColor(): boolean {
  if (hasFlag('no-color') || process.env.NO_COLOR === '1') return false;
  if (hasFlag('color')) return true;
  if (process.env.FORCE_COLOR === '1') return true;
  return process.stdout.isTTY === true;
}

const useColor = supportsColor();

// ── ANSI Color Helpers ──────────────────────────────────────────────────────
const _c = {
  reset: useColor ? '\x1b[0m' : '',
  bold: useColor ? '\x1b[1m' : '',
  dim: useColor ? '\x1b[2m' : '',
  magenta: useColor ? '\x1b[35m' : '',
  brightGreen: useColor ? '\x1b[92m' : '',
  brightCyan: useColor ? '\x1b[96m' : '',
  brightWhite: useColor ? '\x1b[97m' : '',
};

function clr(color: string, text: string): string {
  if (!useColor) return text;
  return `${color}${text}${_c.reset}`;
}
function pass(text: string): string { return clr(_c.brightGreen, text); }
function accent(text: string): string { return clr(_c.magenta, text); }
function heading(text: string): string { return clr(_c.bold + _c.brightWhite, text); }
function dimText(text: string): string { return clr(_c.dim, text); }
function number$(text: string): string { return clr(_c.brightCyan, text); }

function padR(s: string, n: number): string {
  return s.padEnd(n);
}
function padL(s: string, n: number): string {
  return s.padStart(n);
}

function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / 1024 / 1024).toFixed(2)} MB`;
}

// ── Argument Helpers ────────────────────────────────────────────────────────

function requireArg(value: string | undefined, what: string): string {
  if (!value) {
    throw new BpeValidationError(`missing ${what}`, { field: what, reason: 'missing' });
  }
  return value;
}

function readInput(filePath: string): Buffer {
  if (!existsSync(filePath)) {
    throw new BpeValidationError(`file not found: ${filePath}`, {
      field: 'path',
      reason: 'not_found',
      value: filePath,
    });
  }
  return readFileSync(filePath);
}

function parseIntFlag(name: string, raw: string, min?: number): number {
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new BpeValidationError(`--${name} must be an integer, got "${raw}"`, {
      field: name,
      reason: 'not_integer',
      value: raw,
    });
  }
  if (min !== undefined && value < min) {
    throw new BpeValidationError(`--${name} must be an integer >= ${min}, got "${raw}"`, {
      field: name,
      reason: 'out_of_range',
      value: raw,
    });
  }
  return value;
}

function trainTarget(): TrainTarget {
  const vocabSize = getFlag('vocab-size');
  if (vocabSize !== undefined) return { vocabSize: parseIntFlag('vocab-size', vocabSize) };
  const merges = getFlag('merges');
  if (merges !== undefined) return { merges: parseIntFlag('merges', merges) };
  return { merges: loadConfig().defaultMerges };
}

function loadModel(modelPath: string): BpeTokenizer {
  return BpeTokenizer.fromJSON(readInput(modelPath).toString('utf-8'));
}

function defaultModelPath(corpusPath: string): string {
  const parsed = path.parse(corpusPath);
  return path.join(parsed.dir, `${parsed.name}.merges.json`);
}

// ============================================================================
// usage
// ============================================================================
function printUsage(): void {
  console.log(`
  ${heading('bytepair')} — byte-pair encoding tokenizer

  Usage:
    bytepair train   <corpus> [--merges N | --vocab-size V] [--out model.json]
                                              Learn merges from a corpus file
    bytepair encode  <model.json> (--text T | --file F) [--json]
                                              Encode text into token ids
    bytepair decode  <model.json> <id...> [--hex]
                                              Decode token ids
    bytepair stats   <model.json> <file> [--compare cl100k_base]
                                              Compression stats for a file
    bytepair vocab   <model.json> [--limit N] List learned tokens
    bytepair inspect <model.json>             Summarize a merge table

  Display Options:
    --color              Force colored output
    --no-color           Disable colored output

  Environment Variables:
    BPE_DEBUG=1          Debug logging (one line per learned merge)
    BPE_DEFAULT_MERGES   Merges learned when no target is given (default 20)
    NO_COLOR=1           Disable colored output
    FORCE_COLOR=1        Force colored output
  `);
}

// ============================================================================
// train
// ============================================================================
function trainCommand(): void {
  const corpusPath = requireArg(positionals()[0], 'corpus file');
  const outPath = getFlag('out') ?? defaultModelPath(corpusPath);
  const target = trainTarget();

  const corpus = readInput(corpusPath);
  const t = timer('train');
  const tokenizer = BpeTokenizer.train(corpus, target);
  const ms = t.end();

  writeFileSync(outPath, tokenizer.serialize());

  const tokens = tokenizer.countTokens(corpus);
  const ratio = tokenizer.compressionRatio(corpus);
  console.log(`\n  ${heading('bytepair train')} — ${accent(outPath)}`);
  console.log(
    `  Learned ${number$(String(tokenizer.mergeTable.size))} merges (vocab size ${number$(String(tokenizer.vocabSize))}) from ${number$(corpus.length.toLocaleString('en-US'))} bytes ${dimText(`(${ms.toFixed(0)}ms)`)}`,
  );
  console.log(
    `  Corpus: ${number$(corpus.length.toLocaleString('en-US'))} bytes → ${number$(tokens.toLocaleString('en-US'))} tokens (${pass(`${ratio.toFixed(2)} bytes/token`)})\n`,
  );
  tokenizer.dispose();
}

// ============================================================================
// encode
// ============================================================================
function encodeCommand(): void {
  const tokenizer = loadModel(requireArg(positionals()[0], 'model file'));
  const text = getFlag('text');
  const file = getFlag('file');
  const input = text ?? (file !== undefined ? readInput(file) : undefined);
  if (input === undefined) {
    throw new BpeValidationError('encode needs --text or --file', { field: 'input', reason: 'missing' });
  }

  const ids = tokenizer.encode(input);
  console.log(hasFlag('json') ? JSON.stringify(ids) : ids.join(' '));
  tokenizer.dispose();
}

// ============================================================================
// decode
// ============================================================================
function decodeCommand(): void {
  const [modelPath, ...rawIds] = positionals();
  const tokenizer = loadModel(requireArg(modelPath, 'model file'));
  const ids = rawIds
    .flatMap((raw) => raw.split(/[\s,]+/))
    .filter((raw) => raw.length > 0)
    .map((raw) => {
      const id = Number(raw);
      if (!Number.isInteger(id) || id < 0) {
        throw new BpeValidationError(`token id must be a non-negative integer, got "${raw}"`, {
          field: 'id',
          reason: 'not_integer',
          value: raw,
        });
      }
      return id;
    });

  if (hasFlag('hex')) {
    const bytes = tokenizer.decode(ids);
    console.log(Array.from(bytes, (b) => b.toString(16).padStart(2, '0')).join(' '));
  } else {
    console.log(tokenizer.decodeText(ids));
  }
  tokenizer.dispose();
}

// ============================================================================
// stats
// ============================================================================
function statsCommand(): void {
  const [modelPath, filePath] = positionals();
  const tokenizer = loadModel(requireArg(modelPath, 'model file'));
  const input = readInput(requireArg(filePath, 'input file'));

  const tokens = tokenizer.countTokens(input);
  const ratio = tokenizer.compressionRatio(input);
  const reduction = input.length === 0 ? 0 : (1 - tokens / input.length) * 100;

  console.log(`\n  ${heading('bytepair stats')}: ${accent(filePath)}`);
  console.log(`  Merges:           ${number$(String(tokenizer.mergeTable.size))}`);
  console.log(`  Input:            ${number$(formatBytes(input.length))}`);
  console.log(`  Tokens:           ${number$(tokens.toLocaleString('en-US'))} (${pass(`${reduction.toFixed(1)}% fewer`)} than bytes)`);
  console.log(`  Bytes/token:      ${number$(ratio.toFixed(2))}`);

  const compare = getFlag('compare');
  if (compare !== undefined) {
    const encoding = resolveReferenceEncoding(compare);
    const reference = new ReferenceTokenizer(encoding);
    const refTokens = reference.countTokens(input.toString('utf-8'));
    console.log(`  ${padR(`${encoding}:`, 18)}${number$(refTokens.toLocaleString('en-US'))} tokens`);
    reference.dispose();
  }
  console.log('');
  tokenizer.dispose();
}

// ============================================================================
// vocab
// ============================================================================
function vocabCommand(): void {
  const tokenizer = loadModel(requireArg(positionals()[0], 'model file'));
  const limitFlag = getFlag('limit');
  const limit = limitFlag !== undefined ? parseIntFlag('limit', limitFlag, 0) : Number.POSITIVE_INFINITY;

  const entries = tokenizer.mergeTable.entries();
  const width = String(tokenizer.mergeTable.maxId).length;
  for (const { pair, id } of entries.slice(0, limit)) {
    console.log(
      `${padL(String(id), width)}  ${padR(`${pair[0]} + ${pair[1]}`, width * 2 + 3)}  ${tokenizer.describeToken(id)}`,
    );
  }
  tokenizer.dispose();
}

// ============================================================================
// inspect
// ============================================================================
function inspectCommand(): void {
  const modelPath = requireArg(positionals()[0], 'model file');
  const tokenizer = loadModel(modelPath);
  const table = tokenizer.mergeTable;

  console.log(`\n  ${heading('bytepair inspect')}: ${accent(modelPath)}`);
  console.log(`  Hash:             ${dimText(mergeTableHash(table))}`);
  console.log(`  Merges:           ${number$(String(table.size))}`);
  console.log(`  Vocab size:       ${number$(String(table.vocabSize))} (${BYTE_VOCAB_SIZE} bytes + ${table.size} merges)`);
  console.log(`  Highest id:       ${number$(String(table.maxId))}`);

  const first = table.entries().slice(0, 5);
  if (first.length > 0) {
    console.log('  First merges:');
    for (const { pair, id } of first) {
      console.log(`    ${pair[0]} + ${pair[1]} → ${id} ${tokenizer.describeToken(id)}`);
    }
  }
  console.log('');
  tokenizer.dispose();
}

async function runCommand(): Promise<void> {
  setLogLevel(loadConfig().logLevel);

  switch (command) {
    case 'train':
      trainCommand();
      break;
    case 'encode':
      encodeCommand();
      break;
    case 'decode':
      decodeCommand();
      break;
    case 'stats':
      statsCommand();
      break;
    case 'vocab':
      vocabCommand();
      break;
    case 'inspect':
      inspectCommand();
      break;
    default:
      printUsage();
      break;
  }
}

runCommand().catch((error: unknown) => {
  console.error(`Error: ${errorMessage(error)}`);
  process.exit(1);
});
