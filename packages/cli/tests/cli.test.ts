import assert from 'node:assert/strict';
import { spawnSync } from 'node:child_process';
import { mkdtempSync, readFileSync, writeFileSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import test from 'node:test';
import { fileURLToPath } from 'node:url';

const cliPath = fileURLToPath(new URL('../src/cli.ts', import.meta.url));

function runCli(args: string[]) {
  const result = spawnSync(process.execPath, ['--import', 'tsx', cliPath, ...args], {
    encoding: 'utf-8',
    env: {
      ...process.env,
      NO_COLOR: '1',
      FORCE_COLOR: '0',
      BPE_DEBUG: '',
      BPE_CACHE_SIZE: '',
      BPE_DEFAULT_MERGES: '',
      BPE_MAX_MODELS: '',
    },
  });

  return {
    code: result.status ?? 1,
    stdout: result.stdout ?? '',
    stderr: result.stderr ?? '',
  };
}

function workspace(corpus = 'aaabdaaabac') {
  const dir = mkdtempSync(path.join(os.tmpdir(), 'bytepair-cli-'));
  const corpusPath = path.join(dir, 'corpus.txt');
  const modelPath = path.join(dir, 'model.json');
  writeFileSync(corpusPath, corpus);
  return { dir, corpusPath, modelPath };
}

function trained() {
  const ws = workspace();
  const result = runCli(['train', ws.corpusPath, '--merges', '3', '--out', ws.modelPath]);
  assert.equal(result.code, 0, result.stderr);
  return ws;
}

test('train writes the learned merges as JSON', () => {
  const { modelPath } = trained();
  assert.equal(
    readFileSync(modelPath, 'utf-8'),
    [
      '{',
      '  "format": "bytepair-merges",',
      '  "version": 1,',
      '  "merges": [',
      '    [97, 97, 256],',
      '    [97, 98, 257],',
      '    [256, 257, 258]',
      '  ]',
      '}',
      '',
    ].join('\n'),
  );
});

test('train reports the merge count and compression', () => {
  const ws = workspace();
  const result = runCli(['train', ws.corpusPath, '--vocab-size', '276', '--out', ws.modelPath]);
  assert.equal(result.code, 0, result.stderr);
  assert.match(result.stdout, /Learned 3 merges \(vocab size 259\) from 11 bytes/);
  assert.match(result.stdout, /11 bytes → 5 tokens \(2\.20 bytes\/token\)/);
});

test('train defaults the output path next to the corpus', () => {
  const ws = workspace();
  const result = runCli(['train', ws.corpusPath, '--merges', '1']);
  assert.equal(result.code, 0, result.stderr);
  const model = JSON.parse(readFileSync(path.join(ws.dir, 'corpus.merges.json'), 'utf-8')) as {
    merges: number[][];
  };
  assert.deepEqual(model.merges, [[97, 97, 256]]);
});

test('encode prints ids separated by spaces, or JSON with --json', () => {
  const { modelPath } = trained();

  const plain = runCli(['encode', modelPath, '--text', 'aaabdaaabac']);
  assert.equal(plain.code, 0, plain.stderr);
  assert.equal(plain.stdout, '258 100 258 97 99\n');

  const json = runCli(['encode', modelPath, '--text', 'aaabdaaabac', '--json']);
  assert.equal(json.stdout, '[258,100,258,97,99]\n');
});

test('encode reads input from --file', () => {
  const { modelPath, corpusPath } = trained();
  const result = runCli(['encode', modelPath, '--file', corpusPath]);
  assert.equal(result.stdout, '258 100 258 97 99\n');
});

test('decode prints text, or bytes as hex with --hex', () => {
  const { modelPath } = trained();

  const text = runCli(['decode', modelPath, '258', '100']);
  assert.equal(text.code, 0, text.stderr);
  assert.equal(text.stdout, 'aaabd\n');

  const hex = runCli(['decode', modelPath, '258', '--hex']);
  assert.equal(hex.stdout, '61 61 61 62\n');
});

test('decode fails on an id outside the vocabulary', () => {
  const { modelPath } = trained();
  const result = runCli(['decode', modelPath, '999']);
  assert.equal(result.code, 1);
  assert.equal(
    result.stderr,
    'Error: Unknown token id 999 at position 0. Was it encoded with another merge table?\n',
  );
});

test('vocab lists learned tokens in priority order', () => {
  const { modelPath } = trained();

  const all = runCli(['vocab', modelPath]);
  assert.equal(all.code, 0, all.stderr);
  assert.deepEqual(all.stdout.trimEnd().split('\n'), [
    '256  97 + 97    "aa"',
    '257  97 + 98    "ab"',
    '258  256 + 257  "aaab"',
  ]);

  const limited = runCli(['vocab', modelPath, '--limit', '1']);
  assert.equal(limited.stdout, '256  97 + 97    "aa"\n');
});

test('vocab rejects a negative limit', () => {
  const { modelPath } = trained();
  const result = runCli(['vocab', modelPath, '--limit', '-1']);
  assert.equal(result.code, 1);
  assert.equal(result.stdout, '');
  assert.equal(result.stderr, 'Error: --limit must be an integer >= 0, got "-1"\n');
});

test('stats reports tokens and bytes per token', () => {
  const { modelPath, corpusPath } = trained();
  const result = runCli(['stats', modelPath, corpusPath]);
  assert.equal(result.code, 0, result.stderr);
  assert.match(result.stdout, /Tokens: {11}5 \(54\.5% fewer than bytes\)/);
  assert.match(result.stdout, /Bytes\/token: {6}2\.20/);
});

test('stats rejects an unknown reference encoding', () => {
  const { modelPath, corpusPath } = trained();
  const result = runCli(['stats', modelPath, corpusPath, '--compare', 'nope']);
  assert.equal(result.code, 1);
  assert.match(result.stderr, /^Error: Unknown reference encoding "nope"/);
});

test('inspect summarizes the table', () => {
  const { modelPath } = trained();
  const result = runCli(['inspect', modelPath]);
  assert.equal(result.code, 0, result.stderr);
  assert.match(result.stdout, /Merges: {11}3\n/);
  assert.match(result.stdout, /Vocab size: {7}259 \(256 bytes \+ 3 merges\)/);
  assert.match(result.stdout, /Hash: {13}[0-9a-f]{64}/);
  assert.match(result.stdout, /256 \+ 257 → 258 "aaab"/);
});

test('a malformed model file is reported', () => {
  const ws = workspace();
  writeFileSync(ws.modelPath, '{"format":"bytepair-merges","version":1,"merges":[[97,97,10]]}');
  const result = runCli(['encode', ws.modelPath, '--text', 'aa']);
  assert.equal(result.code, 1);
  assert.equal(
    result.stderr,
    'Error: Malformed merge table at entry 0: id 10 must be an integer greater than 255\n',
  );
});

test('missing files exit with code 1', () => {
  const result = runCli(['encode', path.join(os.tmpdir(), 'bytepair-missing.json'), '--text', 'a']);
  assert.equal(result.code, 1);
  assert.match(result.stderr, /^Error: file not found: /);
});

test('no command prints usage', () => {
  const result = runCli([]);
  assert.equal(result.code, 0);
  assert.match(result.stdout, /Usage:/);
  assert.match(result.stdout, /bytepair train/);
});
