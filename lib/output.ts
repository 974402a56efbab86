import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import logger from './logger';
import type { PreviousOutput, RunResult } from './types';

export interface WriteOptions {
  /** Also write `domains_source_map.txt`. */
  sourceMap?: boolean;
}

const stringList = z.array(z.string());

function lines(values: string[]): string {
  return values.length ? `${values.join('\n')}\n` : '';
}

/** `source: domain` lines, sources in processing order. */
export function formatSourceMap(provenance: Record<string, string[]>): string {
  const out: string[] = [];
  for (const [source, domains] of Object.entries(provenance)) {
    for (const d of domains) out.push(`${source}: ${d}`);
  }
  return lines(out);
}

/**
 * Write the run's artifacts into `dir`. Returns the file names written.
 */
export async function writeOutputs(dir: string, result: RunResult, opts: WriteOptions = {}): Promise<string[]> {
  const { snapshot, verification } = result;
  const files: Record<string, string> = {
    'domains.txt': lines(snapshot.domains),
    'domains.json': JSON.stringify(snapshot.domains, null, 2),
    'domains_sha1.txt': lines(snapshot.hashes),
    'domains_sha1.json': JSON.stringify(snapshot.hashes, null, 2),
    'domains_legacy.txt': lines(snapshot.legacy),
  };
  if (verification) {
    const mx = [...verification.mailCapable].sort();
    files['domains_mx.txt'] = lines(mx);
    files['domains_mx.json'] = JSON.stringify(mx, null, 2);
  }
  if (opts.sourceMap) {
    files['domains_source_map.txt'] = formatSourceMap(snapshot.provenance);
  }

  await fs.mkdir(dir, { recursive: true });
  for (const [name, content] of Object.entries(files)) {
    await fs.writeFile(path.join(dir, name), content, 'utf-8');
  }
  logger.info({ dir, files: Object.keys(files).length, domains: snapshot.domains.length }, 'output written');
  return Object.keys(files);
}

async function readList(file: string): Promise<string[]> {
  let text: string;
  try {
    text = await fs.readFile(file, 'utf-8');
  } catch (err) {
    if (typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT') return [];
    throw err;
  }
  try {
    const parsed = stringList.safeParse(JSON.parse(text));
    if (parsed.success) return parsed.data;
    logger.warn({ file }, 'previous output is not a list of strings, ignoring');
  } catch (err) {
    logger.warn({ err, file }, 'previous output is not valid JSON, ignoring');
  }
  return [];
}

/**
 * Domains and hashes published by the previous run, for diffing. Missing
 * files mean a first run.
 */
export async function loadPreviousOutput(dir: string): Promise<PreviousOutput> {
  const [domains, hashes] = await Promise.all([
    readList(path.join(dir, 'domains.json')),
    readList(path.join(dir, 'domains_sha1.json')),
  ]);
  return { domains, hashes };
}
