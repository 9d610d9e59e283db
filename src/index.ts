#!/usr/bin/env node

import chalk from 'chalk';
import { Command } from 'commander';
import { resolveConfig } from './config.js';
import { errorMessage } from './errors.js';
import { compareSummaries } from './compare.js';
import { InferenceClient } from './inference-client.js';
import { withInterrupt } from './interrupt.js';
import { summarize } from './metrics.js';
import { OUTPUT_FORMATS, type OutputFormat, isOutputFormat, printComparison, printResults } from './reporter.js';
import { runLoadTest } from './runner.js';
import { readSummaryFile, writeSummaryFile } from './summary-document.js';

const program = new Command();

program
  .name('llm-load')
  .description('Bounded-concurrency load generator for OpenAI-compatible inference services')
  .version('1.0.0');

function parseFormat(value: string): OutputFormat {
  if (!isOutputFormat(value)) {
    throw new Error(`Unknown output format "${value}" (expected ${OUTPUT_FORMATS.join(', ')})`);
  }
  return value;
}

program
  .command('run')
  .description('Send N chat completion requests with bounded concurrency and summarize the results')
  .option('--url <url>', 'Base URL of the inference service (env: LLM_SERVICE_URL)')
  .option('-n, --requests <number>', 'Total number of requests (env: LOAD_TEST_REQUESTS)')
  .option('-c, --concurrency <number>', 'Maximum requests in flight (env: LOAD_TEST_CONCURRENCY)')
  .option('--timeout <ms>', 'Per-request timeout in milliseconds (env: LOAD_TEST_TIMEOUT_MS)')
  .option('--model <name>', 'Model name sent in each request (env: LLM_MODEL)')
  .option('--max-tokens <number>', 'max_tokens sent in each request (env: LLM_MAX_TOKENS)')
  .option('--temperature <number>', 'Sampling temperature (env: LLM_TEMPERATURE)')
  .option('--label <name>', 'Name of the configuration under test, e.g. baseline (env: LOAD_TEST_LABEL)')
  .option('--save <file>', 'Write the JSON summary to a file')
  .option('-o, --output <format>', 'Output format: pretty, json, csv', 'pretty')
  .action(async (options) => {
    try {
      const format = parseFormat(options.output);
      const config = resolveConfig({
        serviceUrl: options.url,
        totalRequests: options.requests,
        concurrency: options.concurrency,
        timeoutMs: options.timeout,
        model: options.model,
        maxTokens: options.maxTokens,
        temperature: options.temperature,
        label: options.label,
      });

      const client = new InferenceClient({ baseUrl: config.serviceUrl });
      const log = format === 'pretty' ? console.log : console.error;
      log(`Running load test against ${client.completionsUrl}: ${config.totalRequests} requests @ ${config.concurrency} concurrency`);

      const run = await withInterrupt(
        signal =>
          runLoadTest(config, {
            client,
            signal,
            onOutcome: (_, completed) => {
              if (format === 'pretty' && (completed % 10 === 0 || completed === config.totalRequests)) {
                process.stdout.write(`\rProgress: ${completed}/${config.totalRequests}`);
              }
            },
          }),
        () => console.error(chalk.yellow('\nInterrupted: cancelling in-flight requests...'))
      );
      if (format === 'pretty') {
        console.log(''); // New line after progress
      }

      const summary = summarize(config, run);
      printResults(summary, { format });

      if (options.save) {
        await writeSummaryFile(options.save, summary);
        log(`Results saved to ${options.save}`);
      }

      process.exit(summary.failedRequests > 0 ? 1 : 0);
    } catch (error) {
      console.error(`Error: ${errorMessage(error)}`);
      process.exit(2);
    }
  });

program
  .command('compare')
  .description('Compare two saved summaries, e.g. baseline against optimized')
  .argument('<baseline>', 'Summary file of the baseline run')
  .argument('<optimized>', 'Summary file of the optimized run')
  .option('-o, --output <format>', 'Output format: pretty, json, csv', 'pretty')
  .action(async (baselinePath: string, optimizedPath: string, options) => {
    try {
      const format = parseFormat(options.output);
      const [baseline, optimized] = await Promise.all([
        readSummaryFile(baselinePath),
        readSummaryFile(optimizedPath),
      ]);
      printComparison(compareSummaries(baseline, optimized), { format });
    } catch (error) {
      console.error(`Error: ${errorMessage(error)}`);
      process.exit(2);
    }
  });

await program.parseAsync();
