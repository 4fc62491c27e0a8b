#!/usr/bin/env node
/**
 * querysmith entry point - generates query builders from a record schema
 * Loads configuration, runs the generator once and exits
 */
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { readFileSync } from 'fs';
import { join } from 'path';
import { AppModule } from './app.module';
import { GeneratorService } from './generator/generator.service';
import { getLogLevels } from './common/logging.utils';

/**
 * Version from the package manifest, which sits one level above both src/ and dist/
 */
function readVersion(): string {
  const manifest: unknown = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'));
  if (typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string') {
    return manifest.version;
  }
  return 'unknown';
}

/**
 * Bootstrap a Nest application context and run one generation
 */
async function bootstrap(argv: string[]): Promise<void> {
  if (argv.includes('--version')) {
    process.stdout.write(`querysmith ${readVersion()}\n`);
    return;
  }

  // Category listing needs no schema, so no application context either
  if (argv.includes('--types')) {
    const { supported, unsupported } = GeneratorService.listFieldTypes();
    process.stdout.write(`Supported field categories: ${supported.join(', ')}\n`);
    process.stdout.write(`Update-only field categories: ${unsupported.join(', ')}\n`);
    return;
  }

  const logger = new Logger('querysmith');
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: getLogLevels(process.env.LOG_LEVEL),
    abortOnError: false,
  });

  try {
    logger.log('=== querysmith starting ===');
    const result = app.get(GeneratorService).generate();
    if (!result.written) {
      process.stdout.write(result.code);
    }
    logger.log('=== querysmith done ===');
  } finally {
    await app.close();
  }
}

bootstrap(process.argv.slice(2)).catch((error: unknown) => {
  const logger = new Logger('querysmith');
  logger.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
