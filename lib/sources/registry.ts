import { promises as fs } from 'fs';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../errors';
import { resolveAdapter } from './adapters';
import type { SourceDescriptor } from '../types';

const compilableRegex = z.string().min(1).refine((pattern) => {
  try {
    new RegExp(pattern, 'gi');
    return true;
  } catch {
    return false;
  }
}, { message: 'not a valid regular expression' });

const common = {
  id: z.string().min(1).optional(),
  src: z.string().min(1),
  regex: z.union([compilableRegex, z.array(compilableRegex).min(1)]).optional(),
  scrape: z.boolean().optional(),
  encoding: z.string().min(1).optional(),
  timeout: z.number().int().positive().optional(),
  headers: z.record(z.string()).optional(),
};

const httpSchema = z.object({ ...common, type: z.enum(['list', 'json', 'html', 'sha1', 'whitelist']) });
const fileSchema = z.object({ ...common, type: z.enum(['file', 'whitelist_file']), ignoreMissing: z.boolean().optional() });
const wsSchema = z.object({ ...common, type: z.literal('ws') });
const customSchema = z.object({
  ...common,
  type: z.literal('custom'),
  adapter: z.string().min(1),
  format: z.enum(['list', 'json', 'html']).default('json'),
});

const sourceSchema = z.union([httpSchema, fileSchema, wsSchema, customSchema]);
export const sourcesSchema = z.array(sourceSchema);

export type RawSource = z.infer<typeof sourceSchema>;

function toDescriptor(raw: RawSource): SourceDescriptor {
  const common = {
    id: raw.id ?? raw.src,
    src: raw.src,
    regex: typeof raw.regex === 'string' ? [raw.regex] : raw.regex,
    scrape: raw.scrape,
    encoding: raw.encoding,
    timeoutMs: raw.timeout,
    headers: raw.headers,
  };
  switch (raw.type) {
    case 'custom':
      return { ...common, type: 'custom', adapter: resolveAdapter(raw.adapter), format: raw.format };
    case 'ws':
      return { ...common, type: 'ws' };
    case 'file':
    case 'whitelist_file':
      return { ...common, type: raw.type, ignoreMissing: raw.ignoreMissing };
    default:
      return { ...common, type: raw.type };
  }
}

/**
 * Validate a parsed sources document and resolve adapter names.
 */
export function parseSources(input: unknown): SourceDescriptor[] {
  const parsed = sourcesSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ');
    throw new ConfigError(`invalid sources configuration: ${issues}`, parsed.error);
  }
  return parsed.data.map(toDescriptor);
}

export async function loadSources(file: string): Promise<SourceDescriptor[]> {
  let text: string;
  try {
    text = await fs.readFile(file, 'utf-8');
  } catch (err) {
    throw new ConfigError(`cannot read sources file ${file}: ${errorMessage(err)}`, err);
  }
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`sources file ${file} is not valid JSON: ${errorMessage(err)}`, err);
  }
  return parseSources(data);
}

export interface LocalFiles {
  whitelistFile?: string;
  customFile?: string;
}

/**
 * Add the local whitelist (first, so it is read before any feed) and the
 * optional hand-maintained extra-domains file (last).
 */
export function withLocalFiles(sources: SourceDescriptor[], files: LocalFiles): SourceDescriptor[] {
  const out: SourceDescriptor[] = [];
  if (files.whitelistFile) {
    out.push({ id: files.whitelistFile, src: files.whitelistFile, type: 'whitelist_file' });
  }
  out.push(...sources);
  if (files.customFile) {
    out.push({ id: files.customFile, src: files.customFile, type: 'file', ignoreMissing: true });
  }
  return out;
}
