/**
 * Access-pattern benchmarks for the cache strategies.
 *
 * Each strategy replays the same sequential, strided and random read
 * patterns over an in-memory fetcher, and the table reports how many
 * backend calls were made, how many bytes they requested, how many hits
 * each read scored on average, and the wall time.
 *
 * Run: npm run bench
 */

import { CACHE_TYPES, createCache } from '../src/caches/index.js';
import type { CacheType } from '../src/caches/index.js';
import { setLogLevel } from '../src/logger.js';
import type { Fetcher } from '../src/types.js';

// ─── Helpers ────────────────────────────────────────────────────────────────

interface Read {
  start: number;
  end: number;
}

const FILE_SIZE = 16 * 2 ** 20;
const BLOCK_SIZE = 64 * 1024;

function fmt(n: number, decimals: number): string {
  return n.toLocaleString('en-US', { maximumFractionDigits: decimals });
}

/** Small deterministic PRNG so runs are comparable. */
function mulberry32(seed: number): () => number {
  let a = seed;
  return () => {
    a = (a + 0x6d2b79f5) | 0;
    let t = Math.imul(a ^ (a >>> 15), 1 | a);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

// ─── Synthetic data ─────────────────────────────────────────────────────────

function makeFile(size: number): Uint8Array {
  const data = new Uint8Array(size);
  for (let i = 0; i < size; i++) data[i] = i & 0xff;
  return data;
}

function sequential(readSize: number): Read[] {
  const reads: Read[] = [];
  for (let start = 0; start < FILE_SIZE; start += readSize) {
    reads.push({ start, end: Math.min(start + readSize, FILE_SIZE) });
  }
  return reads;
}

function strided(readSize: number, stride: number): Read[] {
  const reads: Read[] = [];
  for (let start = 0; start < FILE_SIZE; start += stride) {
    reads.push({ start, end: Math.min(start + readSize, FILE_SIZE) });
  }
  return reads;
}

function random(readSize: number, count: number, seed: number): Read[] {
  const next = mulberry32(seed);
  const reads: Read[] = [];
  for (let i = 0; i < count; i++) {
    const start = Math.floor(next() * (FILE_SIZE - readSize));
    reads.push({ start, end: start + readSize });
  }
  return reads;
}

// ─── Benchmark suites ───────────────────────────────────────────────────────

async function benchPattern(name: string, reads: Read[], data: Uint8Array): Promise<void> {
  console.log(`\n── ${name} (${fmt(reads.length, 0)} reads) ──`);
  console.log(
    `  ${'strategy'.padEnd(12)} ${'calls'.padStart(10)} ${'requested'.padStart(14)} ${'hits/read'.padStart(10)} ${'ms'.padStart(10)}`,
  );

  for (const type of CACHE_TYPES) {
    await benchStrategy(type, reads, data);
  }
}

async function benchStrategy(type: CacheType, reads: Read[], data: Uint8Array): Promise<void> {
  const fetcher: Fetcher = async (start, end) => data.subarray(start, end);
  const cache = createCache(type, BLOCK_SIZE, fetcher, data.length, {
    maxBlocks: 64,
    parts: [{ start: 0, end: BLOCK_SIZE, data: data.slice(0, BLOCK_SIZE) }],
  });

  const started = performance.now();
  for (const { start, end } of reads) {
    await cache.fetch(start, end);
  }
  const elapsed = performance.now() - started;
  const stats = cache.stats();
  await cache.close();

  const ratio = reads.length === 0 ? 0 : stats.hits / reads.length;
  console.log(
    `  ${type.padEnd(12)} ${fmt(stats.misses, 0).padStart(10)} ${fmt(stats.totalRequestedBytes, 0).padStart(14)} ${fmt(ratio, 3).padStart(10)} ${fmt(elapsed, 1).padStart(10)}`,
  );
}

// ─── Main ───────────────────────────────────────────────────────────────────

console.log('╔══════════════════════════════════════════════════════════════════════╗');
console.log('║  rangefs Cache Strategy Benchmarks                                   ║');
console.log('╚══════════════════════════════════════════════════════════════════════╝');

// `parts` falls back to the fetcher outside its one known block; keep that quiet.
setLogLevel('error');
const data = makeFile(FILE_SIZE);

await benchPattern('Sequential 4 KiB', sequential(4096), data);
await benchPattern('Strided 4 KiB every 256 KiB', strided(4096, 256 * 1024), data);
await benchPattern('Random 4 KiB', random(4096, 2000, 42), data);

console.log('\nDone.');
