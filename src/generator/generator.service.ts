import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { mkdirSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import type { ClassifiedField, ClassifiedRecord } from '../common/types';
import { NoEligibleRecordsError, NoRecordsDefinedError } from '../common/errors';
import { classify } from '../classifier/classifier';
import { supportedCategories, unsupportedCategories } from '../classifier/field-model';
import { TimePatternTable } from '../classifier/time-patterns';
import { synthesizeRecord } from '../synthesis/record-synthesizer';
import type { RecordMethods } from '../synthesis/method.types';
import { assembleFile } from '../codegen/assembler';
import { hasQueryBuilderAnnotation } from '../schema/annotations';
import type { GeneratorConfig } from '../config/generator.config';
import type { RecordDefinition, SchemaDefinition } from '../config/schema.types';

/**
 * Outcome of one generation run
 */
export interface GenerationResult {
  outputPath: string;
  records: RecordMethods[];
  code: string;
  written: boolean;   // false on dry runs
}

export interface FieldTypeListing {
  supported: string[];
  unsupported: string[];
}

/**
 * Runs the schema -> classifier -> synthesizer -> assembler pipeline
 * Reads everything it needs from the validated configuration
 */
@Injectable()
export class GeneratorService {
  private readonly logger = new Logger(GeneratorService.name);

  constructor(private configService: ConfigService) {}

  /**
   * Generate the query builder module for every annotated record
   * Contract violations propagate; per-field anomalies only skip the field
   */
  generate(): GenerationResult {
    const config = this.getConfig();
    const schema = this.configService.get<SchemaDefinition>('schema');
    if (!schema) {
      throw new Error('Schema configuration not found');
    }

    if (schema.records.length === 0) {
      throw new NoRecordsDefinedError(schema.source);
    }

    const patterns = TimePatternTable.withDefaults().extend(schema.timePatterns);
    const records: RecordMethods[] = [];

    for (const definition of schema.records) {
      if (!hasQueryBuilderAnnotation(definition.annotations)) {
        this.logger.debug(`Skipping ${definition.name}: no query builder annotation`);
        continue;
      }

      const classified = this.classifyRecord(definition, config.suffix, patterns, schema.namespace);
      const methods = synthesizeRecord(classified);
      this.logger.log(
        `Generated ${methods.recordName}: ${methods.filterMethods.length} filters, ` +
        `${methods.updateMethods.length} updaters, ${methods.sortMethods.length} sort options`,
      );
      records.push(methods);
    }

    if (records.length === 0) {
      throw new NoEligibleRecordsError(schema.source);
    }

    const file = assembleFile(records, {
      source: schema.source,
      runtimeImport: config.runtimeImport,
      modulePath: schema.modulePath,
      imports: schema.imports,
    });

    for (const reference of file.unresolvedReferences) {
      this.logger.warn(`No import configured for type ${reference}; add it to "imports" or set "module"`);
    }

    if (config.dryRun) {
      this.logger.log(`Dry run: ${config.outputPath} not written`);
      return { outputPath: config.outputPath, records, code: file.code, written: false };
    }

    mkdirSync(dirname(config.outputPath), { recursive: true });
    writeFileSync(config.outputPath, file.code, 'utf-8');
    this.logger.log(`Wrote ${records.length} record builders to ${config.outputPath}`);

    return { outputPath: config.outputPath, records, code: file.code, written: true };
  }

  /**
   * Category names for the --types listing
   */
  static listFieldTypes(): FieldTypeListing {
    return {
      supported: supportedCategories(),
      unsupported: unsupportedCategories(),
    };
  }

  private classifyRecord(
    definition: RecordDefinition,
    suffix: string,
    patterns: TimePatternTable,
    namespace: string,
  ): ClassifiedRecord {
    const fields: ClassifiedField[] = [];

    for (const raw of definition.fields) {
      const field = classify(raw, patterns, namespace);
      if (!field) {
        this.logger.debug(`Skipping excluded field ${definition.name}.${raw.name}`);
        continue;
      }
      fields.push(field);
    }

    return { name: definition.name + suffix, fields };
  }

  private getConfig(): GeneratorConfig {
    const config = this.configService.get<GeneratorConfig>('generator');
    if (!config) {
      throw new Error('Generator configuration not found');
    }
    return config;
  }
}
