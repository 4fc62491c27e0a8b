import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { Logger } from '@nestjs/common';
import * as fs from 'fs';
import { GeneratorService } from './generator.service';
import { parseSchema } from '../config/schema.config';
import type { GeneratorConfig } from '../config/generator.config';
import type { SchemaDefinition } from '../config/schema.types';
import { NoEligibleRecordsError, NoRecordsDefinedError } from '../common/errors';

jest.mock('fs');

const catalog = {
  namespace: 'catalog',
  imports: { datatypes: './datatypes' },
  timeTypes: ['datatypes.Date'],
  records: {
    Product: {
      annotations: ['// gen:querybuilder'],
      fields: {
        ID: 'number',
        Name: 'string',
        Tags: 'string[]',
        UpdatedAt: 'Date | null',
        ReleasedOn: 'datatypes.Date',
        Type: 'string',
        Secret: { type: 'string', exclude: true },
      },
    },
    AuditLog: {
      fields: { Message: 'string' },
    },
  },
};

describe('GeneratorService', () => {
  let mockConfigService: { get: jest.Mock };

  const baseConfig: GeneratorConfig = {
    schemaPath: 'models/catalog.yaml',
    outputPath: 'models/generated/catalog.querybuilder.ts',
    suffix: '',
    runtimeImport: 'querysmith/runtime',
    dryRun: false,
  };

  async function createService(
    generator: GeneratorConfig | undefined,
    schema: SchemaDefinition | undefined,
  ): Promise<GeneratorService> {
    mockConfigService = {
      get: jest.fn((key: string) => (key === 'generator' ? generator : key === 'schema' ? schema : undefined)),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        GeneratorService,
        { provide: ConfigService, useValue: mockConfigService },
      ],
    }).compile();

    return module.get<GeneratorService>(GeneratorService);
  }

  afterEach(() => {
    jest.clearAllMocks();
    jest.restoreAllMocks();
  });

  describe('generate', () => {
    it('should generate builders for annotated records only', async () => {
      const service = await createService(baseConfig, parseSchema(catalog, 'models/catalog.yaml'));

      const result = service.generate();

      expect(result.records.map(record => record.recordName)).toEqual(['Product']);
      expect(result.written).toBe(true);
      expect(result.outputPath).toBe('models/generated/catalog.querybuilder.ts');
      expect(result.code).toContain('// Code generated by querysmith from models/catalog.yaml. DO NOT EDIT.');
      expect(result.code).not.toContain('AuditLog');
    });

    it('should write the file, creating its directory', async () => {
      const service = await createService(baseConfig, parseSchema(catalog, 'models/catalog.yaml'));

      const result = service.generate();

      expect(fs.mkdirSync).toHaveBeenCalledWith('models/generated', { recursive: true });
      expect(fs.writeFileSync).toHaveBeenCalledWith('models/generated/catalog.querybuilder.ts', result.code, 'utf-8');
    });

    it('should not write anything on a dry run', async () => {
      const service = await createService({ ...baseConfig, dryRun: true }, parseSchema(catalog, 'models/catalog.yaml'));

      const result = service.generate();

      expect(result.written).toBe(false);
      expect(fs.writeFileSync).not.toHaveBeenCalled();
      expect(fs.mkdirSync).not.toHaveBeenCalled();
    });

    it('should append the suffix to record names', async () => {
      const service = await createService({ ...baseConfig, suffix: 'V1' }, parseSchema(catalog, 'models/catalog.yaml'));

      const result = service.generate();

      expect(result.records[0].recordName).toBe('ProductV1');
      expect(result.code).toContain('export class ProductV1Filters implements EntityFilter {');
      expect(result.code).toContain('export const ProductV1DbSchema = {');
    });

    describe('synthesized methods', () => {
      let service: GeneratorService;

      beforeEach(async () => {
        service = await createService(baseConfig, parseSchema(catalog, 'models/catalog.yaml'));
      });

      const findFilter = (name: string) => {
        const [product] = service.generate().records;
        return product.filterMethods.find(method => method.name === name);
      };

      it('should give string fields a LIKE filter', () => {
        expect(findFilter('NameLike')?.parameterList).toEqual([{ name: 'name', type: 'string', variadic: false }]);
      });

      it('should give nullable fields parameterless null checks', () => {
        expect(findFilter('UpdatedAtIsNull')?.parameterList).toEqual([]);
        expect(findFilter('UpdatedAtLt')).toBeUndefined();
      });

      it('should give list filters a variadic parameter', () => {
        expect(findFilter('IDIn')?.parameterList).toEqual([{ name: 'ids', type: 'number', variadic: true }]);
      });

      it('should only give slices an updater', () => {
        const [product] = service.generate().records;

        expect(product.filterMethods.filter(method => method.name.startsWith('Tags'))).toEqual([]);
        expect(product.sortMethods.filter(method => method.name.startsWith('OrderByTags'))).toEqual([]);
        expect(product.updateMethods.map(method => method.name)).toContain('SetTags');
      });

      it('should treat schema time types as orderable time', () => {
        const [product] = service.generate().records;

        expect(product.filterMethods.filter(method => method.name.startsWith('ReleasedOn')).map(method => method.name)).toEqual([
          'ReleasedOnEq', 'ReleasedOnNe', 'ReleasedOnLt', 'ReleasedOnGt',
          'ReleasedOnLte', 'ReleasedOnGte', 'ReleasedOnIn', 'ReleasedOnNotIn',
        ]);
      });

      it('should rename reserved parameter names', () => {
        expect(findFilter('TypeEq')?.parameterList[0].name).toBe('typeValue');
      });

      it('should skip excluded fields entirely', () => {
        const [product] = service.generate().records;

        expect(product.columns.map(column => column.logicalName)).toEqual([
          'ID', 'Name', 'Tags', 'UpdatedAt', 'ReleasedOn', 'Type',
        ]);
      });
    });

    it('should warn about types it cannot import', async () => {
      const warn = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
      const service = await createService(baseConfig, parseSchema({ ...catalog, imports: {} }, 'models/catalog.yaml'));

      service.generate();

      expect(warn).toHaveBeenCalledWith('No import configured for type datatypes.Date; add it to "imports" or set "module"');
    });

    it('should fail when no record is annotated', async () => {
      const schema = parseSchema({ records: { AuditLog: { fields: { Message: 'string' } } } }, 'audit.yaml');
      const service = await createService(baseConfig, schema);

      expect(() => service.generate()).toThrow(NoEligibleRecordsError);
      expect(() => service.generate()).toThrow('No eligible records found in audit.yaml: annotate a record with @querybuilder');
    });

    it('should fail when the schema has no records', async () => {
      const service = await createService(baseConfig, parseSchema({ records: {} }, 'empty.yaml'));

      expect(() => service.generate()).toThrow(NoRecordsDefinedError);
      expect(() => service.generate()).toThrow('No records defined in empty.yaml');
    });

    it('should fail without configuration', async () => {
      const service = await createService(undefined, undefined);

      expect(() => service.generate()).toThrow('Generator configuration not found');
    });

    it('should fail without a schema', async () => {
      const service = await createService(baseConfig, undefined);

      expect(() => service.generate()).toThrow('Schema configuration not found');
    });
  });

  describe('listFieldTypes', () => {
    it('should list supported and update-only categories', () => {
      expect(GeneratorService.listFieldTypes()).toEqual({
        supported: ['unknown', 'string', 'numeric', 'time', 'boolean', 'pointer'],
        unsupported: ['slice', 'map', 'aggregate'],
      });
    });
  });
});
