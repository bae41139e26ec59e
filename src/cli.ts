#!/usr/bin/env node
import { writeFile } from 'node:fs/promises';
import { createRequire } from 'node:module';
import { Command } from 'commander';

import { createDefaultHandlers } from './crawler/handlers/defaultHandlers.js';
import { createConfigurationError, createOutputError } from './errors.js';
import { runCrawl } from './index.js';
import { configureLogger, isLogLevel } from './logger.js';
import type { CrawlConfigInput, OutputFormat } from './types.js';
import { loadAuthorityRules } from './util/authorityRulesFile.js';
import { reportCrawlerError } from './util/errorHandler.js';
import { flushQuietProgress, logError, renderResult, resetOutputConfig, setOutputConfig } from './util/output.js';

const require = createRequire(import.meta.url);
// eslint-disable-next-line @typescript-eslint/no-var-requires -- package.json access for CLI metadata
const pkg = require('../package.json') as { version?: string };

interface AuditFlags {
  maxPages?: string;
  delay?: string;
  timeoutMs?: string;
  authorityRules?: string;
  wwwEquivalence: boolean;
  sitemap: boolean;
  format?: string;
  output?: string;
  quiet?: boolean;
  logLevel?: string;
}

const program = new Command();

program
  .name('link-auditor')
  .description('Crawl a website and audit every external link it points to.')
  .version(pkg.version ?? '0.0.0');

program
  .command('audit')
  .description('Crawl the site at <rootUrl> and report its external links.')
  .argument('<rootUrl>', 'Website to audit, e.g. https://example.com')
  .option('--max-pages <number>', 'Maximum number of pages to visit. (default: 500)')
  .option('--delay <seconds>', 'Minimum delay between requests in seconds. (default: 0.3)')
  .option('--timeout-ms <number>', 'Timeout per request in milliseconds. (default: 15000)')
  .option('--authority-rules <path>', 'JSON file with extra tldSuffixes, domains and keywords.')
  .option('--no-www-equivalence', 'Treat www.<host> and <host> as different sites.')
  .option('--no-sitemap', 'Skip sitemap.xml discovery and spider from the root URL only.')
  .option('--format <format>', 'Output format (text or json). (default: text)')
  .option('--output <path>', 'Write the final report to a file instead of stdout.')
  .option('--quiet', 'Show a single progress line instead of per-page output.')
  .option('--log-level <level>', 'Log verbosity (pino levels: trace|debug|info|warn|error|fatal|silent).')
  .action(async (rootUrl: string, flags: AuditFlags) => {
    try {
      await audit(rootUrl, flags);
    } catch (error) {
      reportCliError(error);
    }
  });

await program.parseAsync(process.argv);

async function audit(rootUrl: string, flags: AuditFlags): Promise<void> {
  const format = parseFormat(flags.format);
  const config = await buildConfig(rootUrl, flags);

  if (flags.logLevel !== undefined) {
    if (!isLogLevel(flags.logLevel)) {
      throw createConfigurationError(`Unsupported log level: ${flags.logLevel}`, { value: flags.logLevel });
    }
    configureLogger({ level: flags.logLevel });
  }

  const controller = new AbortController();
  const onSigint = (): void => {
    logError('[cancel] stopping after the current page');
    controller.abort();
  };
  process.once('SIGINT', onSigint);
  setOutputConfig({ quiet: flags.quiet === true });

  try {
    const result = await runCrawl(config, {
      handlers: createDefaultHandlers(format),
      signal: controller.signal,
    });
    flushQuietProgress();

    const rendered = renderResult(result, format);
    if (flags.output) {
      try {
        await writeFile(flags.output, rendered, 'utf8');
      } catch (error) {
        throw createOutputError(
          `Unable to write report to ${flags.output}`,
          { path: flags.output },
          { severity: 'fatal', cause: error },
        );
      }
      logError(`[report] written to ${flags.output}`);
    } else {
      process.stdout.write(rendered);
    }
  } finally {
    process.removeListener('SIGINT', onSigint);
    resetOutputConfig();
  }
}

async function buildConfig(rootUrl: string, flags: AuditFlags): Promise<CrawlConfigInput> {
  const config: CrawlConfigInput = {
    rootUrl,
    wwwEquivalence: flags.wwwEquivalence,
    useSitemap: flags.sitemap,
  };

  if (flags.maxPages !== undefined) {
    config.maxPages = asNumber(flags.maxPages, 'max-pages');
  }

  if (flags.delay !== undefined) {
    config.delaySeconds = asNumber(flags.delay, 'delay');
  }

  if (flags.timeoutMs !== undefined) {
    config.timeoutMs = asNumber(flags.timeoutMs, 'timeout-ms');
  }

  if (flags.authorityRules !== undefined) {
    config.authorityRules = await loadAuthorityRules(flags.authorityRules);
  }

  return config;
}

function parseFormat(value: string | undefined): OutputFormat {
  const format = (value ?? 'text').toLowerCase();
  if (!isOutputFormat(format)) {
    throw createConfigurationError(`Unsupported format: ${format}`, { value: format });
  }
  return format;
}

function asNumber(value: unknown, label: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw createConfigurationError(`${label} must be a finite number.`, { value });
  }

  return parsed;
}

function reportCliError(error: unknown): void {
  const crawlerError = reportCrawlerError(error, { stage: 'cli' }, {
    defaultKind: 'internal',
    defaultSeverity: 'fatal',
    throwOnFatal: false,
  });
  logError(`Error: ${crawlerError.message}`);
  process.exitCode = 1;
}

function isOutputFormat(value: string): value is OutputFormat {
  return value === 'text' || value === 'json';
}
