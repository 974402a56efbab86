#!/usr/bin/env node

/**
 * Disposable domain aggregator CLI
 *
 * Usage:
 *   disposable-domains
 *   disposable-domains --dns-verify --dns-threads 20
 *   disposable-domains --src tempr.email --debug
 */

import { promises as fs } from 'fs';
import path from 'path';
import { runAggregation } from '../lib/orchestrator';
import { loadSources, withLocalFiles } from '../lib/sources/registry';
import { loadPreviousOutput, writeOutputs } from '../lib/output';
import { AggregatorError } from '../lib/errors';
import { disconnectRedis } from '../lib/redisAdapter';
import { register } from '../lib/metrics';
import logger, { setLogLevel } from '../lib/logger';
import { CONFIG } from '../lib/config';
import type { RunOptions } from '../lib/types';

/**
 * Command line arguments
 */
export interface CliArgs {
  dnsVerify: boolean;
  sourceMap: boolean;
  src?: string;
  debug: boolean;
  verbose: boolean;
  quiet: boolean;
  maxRetry: number;
  dnsThreads: number;
  dnsTimeout: number;
  dnsNameservers: string[];
  dnsPort: number;
  listNoMx: boolean;
  whitelist: string;
  custom: string;
  sources: string;
  output: string;
  metrics: boolean;
  help: boolean;
  errors: string[];
}

const NUMERIC_FLAGS = {
  '--max-retry': 'maxRetry',
  '--dns-threads': 'dnsThreads',
  '--dns-timeout': 'dnsTimeout',
  '--dns-port': 'dnsPort',
} as const;

// flags whose value must be at least 1
const POSITIVE_FLAGS = new Set<string>(['--dns-timeout']);

const PATH_FLAGS = {
  '--whitelist': 'whitelist',
  '--custom': 'custom',
  '--sources': 'sources',
  '--output': 'output',
} as const;

function isNumericFlag(arg: string): arg is keyof typeof NUMERIC_FLAGS {
  return Object.prototype.hasOwnProperty.call(NUMERIC_FLAGS, arg);
}

function isPathFlag(arg: string): arg is keyof typeof PATH_FLAGS {
  return Object.prototype.hasOwnProperty.call(PATH_FLAGS, arg);
}

/**
 * Parses command line arguments
 */
export function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = {
    dnsVerify: false,
    sourceMap: false,
    debug: false,
    verbose: false,
    quiet: false,
    maxRetry: CONFIG.FETCH.MAX_RETRIES,
    dnsThreads: CONFIG.DNS.THREADS,
    dnsTimeout: CONFIG.DNS.TIMEOUT_MS,
    dnsNameservers: CONFIG.DNS.NAMESERVERS,
    dnsPort: CONFIG.DNS.PORT,
    listNoMx: false,
    whitelist: CONFIG.PATHS.WHITELIST,
    custom: CONFIG.PATHS.CUSTOM,
    sources: CONFIG.PATHS.SOURCES,
    output: CONFIG.PATHS.OUTPUT,
    metrics: false,
    help: false,
    errors: [],
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    if (arg === '--help' || arg === '-h') {
      result.help = true;
    } else if (arg === '--dns-verify') {
      result.dnsVerify = true;
    } else if (arg === '--source-map') {
      result.sourceMap = true;
    } else if (arg === '--debug') {
      result.debug = true;
    } else if (arg === '--verbose' || arg === '-v') {
      result.verbose = true;
    } else if (arg === '--quiet' || arg === '-q') {
      result.quiet = true;
    } else if (arg === '--list-no-mx') {
      result.listNoMx = true;
    } else if (arg === '--metrics') {
      result.metrics = true;
    } else if (arg === '--src' || arg === '--dns-nameservers' || isNumericFlag(arg) || isPathFlag(arg)) {
      i++;
      const value = args[i];
      if (value === undefined || value.startsWith('--')) {
        result.errors.push(`${arg} requires a value`);
        continue;
      }
      if (arg === '--src') {
        result.src = value;
      } else if (arg === '--dns-nameservers') {
        result.dnsNameservers = value.split(',').map((s) => s.trim()).filter(Boolean);
      } else if (isNumericFlag(arg)) {
        const n = parseInt(value, 10);
        const min = POSITIVE_FLAGS.has(arg) ? 1 : 0;
        if (Number.isFinite(n) && n >= min) result[NUMERIC_FLAGS[arg]] = n;
        else result.errors.push(`${arg} expects a ${min ? 'positive' : 'non-negative'} integer, got "${value}"`);
      } else {
        result[PATH_FLAGS[arg]] = value;
      }
    } else {
      result.errors.push(`unknown argument "${arg}"`);
    }

    i++;
  }

  return result;
}

function printHelp(): void {
  console.log(`
Disposable domain aggregator

Collects disposable e-mail domains from the configured sources, removes
whitelisted providers and writes sorted lists plus SHA1 hashes.

USAGE
  disposable-domains [options]

OPTIONS
  -h, --help                 Show this help message
  --dns-verify               Keep only domains with a usable mail exchanger (writes domains_mx.*)
  --source-map               Write domains_source_map.txt
  --src <text>               Only process sources whose id or URL contains <text>
  --debug                    Debug logging; abort when a source yields nothing usable
  -v, --verbose              Debug logging
  -q, --quiet                Warnings and errors only
  --max-retry <n>            Retries after a timed-out fetch (default: ${CONFIG.FETCH.MAX_RETRIES})
  --dns-threads <n>          Concurrent DNS verifications (default: ${CONFIG.DNS.THREADS})
  --dns-timeout <ms>         Per-query DNS timeout (default: ${CONFIG.DNS.TIMEOUT_MS})
  --dns-nameservers <a,b>    Nameservers to query instead of the system resolver
  --dns-port <n>             Nameserver port (default: ${CONFIG.DNS.PORT})
  --list-no-mx               Log every domain without a usable mail exchanger
  --whitelist <path>         Local whitelist file
  --custom <path>            Extra domains file (optional)
  --sources <path>           Sources configuration (JSON)
  --output <dir>             Output directory
  --metrics                  Write Prometheus metrics to <output>/metrics.prom
`);
}

export function toRunOptions(args: CliArgs): RunOptions {
  return {
    verifyDns: args.dnsVerify,
    onlySource: args.src,
    strict: args.debug,
    maxRetries: args.maxRetry,
    dnsThreads: Math.max(1, args.dnsThreads),
    dnsTimeoutMs: args.dnsTimeout,
    dnsNameservers: args.dnsNameservers,
    dnsPort: args.dnsPort,
    listNoMx: args.listNoMx,
  };
}

/**
 * Main CLI entry point. Resolves to the process exit code.
 */
export async function main(argv: string[]): Promise<number> {
  const args = parseArgs(argv);

  if (args.help) {
    printHelp();
    return 0;
  }
  if (args.errors.length) {
    for (const e of args.errors) console.error(`Error: ${e}`);
    console.error(`\nRun 'disposable-domains --help' for more information.`);
    return 2;
  }

  if (args.quiet) setLogLevel('warn');
  if (args.verbose || args.debug) setLogLevel('debug');

  try {
    const configured = await loadSources(args.sources);
    const sources = withLocalFiles(configured, { whitelistFile: args.whitelist, customFile: args.custom });
    const previous = await loadPreviousOutput(args.output);

    const result = await runAggregation(sources, { ...toRunOptions(args), previous });
    await writeOutputs(args.output, result, { sourceMap: args.sourceMap });
    if (args.metrics) {
      await fs.writeFile(path.join(args.output, 'metrics.prom'), await register.metrics(), 'utf-8');
    }

    const { snapshot, diff, verification } = result;
    console.log(
      `${snapshot.domains.length} domains, ${snapshot.hashes.length} hashes` +
        ` (+${diff.addedDomains.length} / -${diff.removedDomains.length} since last run)` +
        (verification ? `, ${verification.mailCapable.length} accept mail` : ''),
    );
    return 0;
  } catch (err) {
    if (err instanceof AggregatorError) {
      logger.error({ err, code: err.code }, 'run aborted');
      console.error(`Error: ${err.message}`);
      return 1;
    }
    throw err;
  } finally {
    await disconnectRedis();
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      logger.fatal({ err }, 'unexpected failure');
      process.exitCode = 1;
    },
  );
}
