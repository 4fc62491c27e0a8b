import { registerAs } from '@nestjs/config';
import { IsBoolean, IsNotEmpty, IsString, Matches } from 'class-validator';
import { basename, dirname, extname, join } from 'path';
import { validateConfig } from './config-validation';

export const DEFAULT_SCHEMA_PATH = './schema.yaml';
export const DEFAULT_RUNTIME_IMPORT = 'querysmith/runtime';

/**
 * Generation run configuration
 * Validated using class-validator decorators
 */
export class GeneratorConfig {
  @IsString()
  @IsNotEmpty()
  schemaPath!: string;

  @IsString()
  @IsNotEmpty()
  outputPath!: string;

  @IsString()
  @Matches(/^[A-Za-z0-9]*$/, { message: 'suffix must be alphanumeric' })
  suffix!: string;

  @IsString()
  @IsNotEmpty()
  runtimeImport!: string;

  @IsBoolean()
  dryRun!: boolean;
}

/**
 * models/schema.yaml -> models/schema.querybuilder.ts
 */
export function defaultOutputPath(schemaPath: string): string {
  const base = basename(schemaPath, extname(schemaPath));
  return join(dirname(schemaPath), `${base}.querybuilder.ts`);
}

/**
 * Generator configuration factory
 * Loads settings from environment variables with defaults
 */
export default registerAs('generator', (): GeneratorConfig => {
  const schemaPath = process.env.SCHEMA_PATH || DEFAULT_SCHEMA_PATH;
  const rawConfig = {
    schemaPath,
    outputPath: process.env.OUTPUT_PATH || defaultOutputPath(schemaPath),
    suffix: process.env.RECORD_SUFFIX || '',
    runtimeImport: process.env.RUNTIME_IMPORT || DEFAULT_RUNTIME_IMPORT,
    dryRun: process.env.DRY_RUN === 'true',
  };

  return validateConfig(rawConfig, 'generator', GeneratorConfig);
});
