#!/usr/bin/env node
/**
 * sqlcase CLI
 * List, inspect and execute schema-driven use cases.
 */

import { cac } from 'cac';
import { createEngine, start } from './index.js';
import { parseExecOptions } from './cli/params.js';
import * as logger from './cli/logger.js';

const cli = cac('sqlcase');

cli.version('0.1.0');
cli.help();

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * sqlcase serve
 * Start the HTTP API
 */
cli
  .command('serve', 'Start the HTTP API server')
  .option('-p, --port <port>', 'Server port')
  .option('--host <host>', 'Bind address')
  .action(async (options: { port?: number | string; host?: string }) => {
    logger.printBanner();
    await start(options.port === undefined ? undefined : Number(options.port), options.host);
  });

/**
 * sqlcase catalog
 * Generate (or reuse) and print the use-case catalog
 */
cli
  .command('catalog', 'List generated use cases')
  .action(async () => {
    const engine = createEngine();
    const spinner = logger.spinner('Generating use cases from the schema...');
    try {
      const catalog = await engine.listCatalog();
      spinner.succeed(`${catalog.useCases.length} use case(s) for ${catalog.backendKind}`);

      for (const useCase of catalog.useCases) {
        logger.section(`${useCase.category}: ${useCase.description}`);
        console.log(`  id: ${useCase.id}`);
        logger.code(useCase.template, 'sql');
        if (useCase.inputParameters.length > 0) {
          console.log(`  inputs: ${useCase.inputParameters.map((p) => `${p.name} (${p.type})`).join(', ')}`);
        }
      }
    } catch (error) {
      spinner.fail('Catalog generation failed');
      logger.error(errorMessage(error));
      process.exitCode = 1;
    } finally {
      await engine.close();
    }
  });

/**
 * sqlcase exec <target>
 * Execute a use case (id or description) or a raw template
 */
cli
  .command('exec <target>', 'Execute a use case or a statement template')
  .option('--param <name=value>', 'Parameter value (repeatable)')
  .option('--values <json>', 'Parameter values as a JSON object or array')
  .example('sqlcase exec "DELETE FROM employees WHERE id = :id" --param id=7')
  .action(async (target: string, options: unknown) => {
    const engine = createEngine();
    try {
      const result = await engine.execute(target, parseExecOptions(options));
      logger.printResult(result);
      if (result.outcome.type === 'failure') {
        process.exitCode = 1;
      }
    } catch (error) {
      logger.error('Execution failed', errorMessage(error));
      process.exitCode = 1;
    } finally {
      await engine.close();
    }
  });

/**
 * sqlcase schema
 * Print the schema description handed to the generator
 */
cli
  .command('schema', 'Print the database schema description')
  .action(async () => {
    const engine = createEngine();
    try {
      console.log(await engine.describeSchema());
    } catch (error) {
      logger.error('Schema extraction failed', errorMessage(error));
      process.exitCode = 1;
    } finally {
      await engine.close();
    }
  });

// Parse CLI arguments
cli.parse();
