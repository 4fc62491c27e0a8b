import * as fs from 'fs';
import { load } from 'js-yaml';
import schemaConfig, { loadSchema, parseSchema } from './schema.config';
import type { RawTypeShape } from '../common/types';

jest.mock('fs');

const string: RawTypeShape = { kind: 'primitive', name: 'string', isString: true, isNumeric: false };
const number: RawTypeShape = { kind: 'primitive', name: 'number', isString: false, isNumeric: true };

const catalogYaml = `
namespace: catalog
module: ./models
imports:
  datatypes: ./datatypes
timeTypes:
  - datatypes.Date
  - type: datatypes.Day
    orderable: false
types:
  Sku: string
  'datatypes.JSONSlice<T>': 'T[]'
records:
  Product:
    annotations: ['@querybuilder']
    fields:
      ID: number
      Code: Sku
      Name: { type: string, column: product_name }
      Aliases: datatypes.JSONSlice<string>
      Secret: { type: string, tag: '-' }
  AuditLog:
    fields:
      Message: string
`;

describe('SchemaConfig', () => {
  const originalEnv = process.env;

  afterEach(() => {
    jest.clearAllMocks();
    process.env = originalEnv;
  });

  describe('loadSchema', () => {
    it('should load record definitions from YAML', () => {
      (fs.readFileSync as jest.Mock).mockReturnValue(catalogYaml);

      const schema = loadSchema('catalog.yaml');

      expect(fs.readFileSync).toHaveBeenCalledWith('catalog.yaml', 'utf-8');
      expect(schema.source).toBe('catalog.yaml');
      expect(schema.records.map(record => record.name)).toEqual(['Product', 'AuditLog']);
    });

    it('should throw a helpful error when the file is missing', () => {
      (fs.readFileSync as jest.Mock).mockImplementation(() => {
        const error: NodeJS.ErrnoException = new Error('ENOENT: no such file or directory');
        error.code = 'ENOENT';
        throw error;
      });

      expect(() => loadSchema('missing.yaml')).toThrow(
        'Schema file not found: missing.yaml. Please ensure the file exists or set SCHEMA_PATH environment variable.',
      );
    });

    it('should rethrow other read errors', () => {
      (fs.readFileSync as jest.Mock).mockImplementation(() => {
        throw new Error('EACCES: permission denied');
      });

      expect(() => loadSchema('locked.yaml')).toThrow('EACCES: permission denied');
    });

    it('should be registered under the schema key and read SCHEMA_PATH', () => {
      process.env = { ...originalEnv, SCHEMA_PATH: 'models/catalog.yaml' };
      (fs.readFileSync as jest.Mock).mockReturnValue(catalogYaml);

      const schema = schemaConfig();

      expect(schemaConfig.KEY).toBe('CONFIGURATION(schema)');
      expect(fs.readFileSync).toHaveBeenCalledWith('models/catalog.yaml', 'utf-8');
      expect(schema.namespace).toBe('catalog');
    });
  });

  describe('parseSchema', () => {
    const schema = parseSchema(load(catalogYaml), 'catalog.yaml');

    it('should read the file-level settings', () => {
      expect(schema.namespace).toBe('catalog');
      expect(schema.modulePath).toBe('./models');
      expect(schema.imports).toEqual({ datatypes: './datatypes' });
      expect(schema.timePatterns).toEqual([
        { exactTypeName: 'datatypes.Date', isOrderable: true },
        { exactTypeName: 'datatypes.Day', isOrderable: false },
      ]);
    });

    it('should resolve fields in declaration order', () => {
      const [product] = schema.records;

      expect(product.annotations).toEqual(['@querybuilder']);
      expect(product.fields).toEqual([
        { name: 'ID', type: number, settings: {} },
        {
          name: 'Code',
          type: { kind: 'named', name: 'Sku', namespace: 'catalog', underlying: string, typeArguments: [] },
          settings: {},
        },
        { name: 'Name', type: string, settings: { COLUMN: 'product_name' } },
        {
          name: 'Aliases',
          type: {
            kind: 'named',
            name: 'JSONSlice',
            namespace: 'datatypes',
            underlying: { kind: 'slice', element: string },
            typeArguments: [string],
          },
          settings: {},
        },
        { name: 'Secret', type: string, settings: { '-': '-' } },
      ]);
    });

    it('should default annotations to an empty list', () => {
      expect(schema.records[1].annotations).toEqual([]);
    });

    it('should require a records section', () => {
      expect(() => parseSchema({ namespace: 'catalog' }, 'catalog.yaml')).toThrow(
        'Invalid schema file: must contain a "records" section',
      );
      expect(() => parseSchema(undefined, 'empty.yaml')).toThrow(
        'Invalid schema file: must contain a "records" section',
      );
    });

    it('should accept an empty records section', () => {
      expect(parseSchema({ records: {} }, 'empty.yaml').records).toEqual([]);
    });

    it('should require fields on every record', () => {
      expect(() => parseSchema({ records: { Product: { fields: {} } } }, 'catalog.yaml')).toThrow(
        "Record 'Product' must have at least one field defined",
      );
    });

    it('should name the record and field of an invalid type', () => {
      const data = { records: { Product: { fields: { Broken: 'Array<' } } } };

      expect(() => parseSchema(data, 'catalog.yaml')).toThrow(
        "Invalid type 'Array<' for field 'Broken' in record 'Product': Invalid type expression 'Array<': ",
      );
    });

    it('should keep types it cannot model as opaque fields', () => {
      const data = {
        records: {
          Shape: {
            fields: {
              Point: '[number, number]',
              OnChange: '() => void',
              Code: 'string & { brand: true }',
              Labels: 'readonly string[]',
              Key: 'keyof Shape',
              Visible: 'true | false',
            },
          },
        },
      };

      const [shape] = parseSchema(data, 'shapes.yaml').records;

      expect(shape.fields.map(field => field.type)).toEqual([
        { kind: 'opaque', text: '[number, number]' },
        { kind: 'opaque', text: '() => void' },
        { kind: 'opaque', text: 'string & { brand: true }' },
        { kind: 'slice', element: string, collection: 'ReadonlyArray' },
        { kind: 'opaque', text: 'keyof Shape' },
        { kind: 'opaque', text: 'true | false' },
      ]);
    });

    it('should reject field entries without a type', () => {
      const data = { records: { Product: { fields: { Name: { column: 'name' } } } } };

      expect(() => parseSchema(data, 'catalog.yaml')).toThrow(
        `Field 'Name' in record 'Product' must be a type string or a mapping with a "type" key`,
      );
    });

    it('should reject names that are not identifiers', () => {
      expect(() => parseSchema({ records: { 'Order Line': { fields: { ID: 'number' } } } }, 'catalog.yaml')).toThrow(
        "Invalid record name 'Order Line': must be an identifier",
      );
      expect(() => parseSchema({ records: { Order: { fields: { 'line-id': 'number' } } } }, 'catalog.yaml')).toThrow(
        "Invalid field name 'line-id' in record 'Order': must be an identifier",
      );
    });

    it('should reject type parameters that are not plain names', () => {
      const data = { types: { 'Box<string[]>': 'string' }, records: { Order: { fields: { ID: 'number' } } } };

      expect(() => parseSchema(data, 'catalog.yaml')).toThrow(
        "Invalid type declaration 'Box<string[]>': type parameters must be plain names",
      );
    });

    it('should reject malformed time types', () => {
      const data = { timeTypes: [42], records: { Order: { fields: { ID: 'number' } } } };

      expect(() => parseSchema(data, 'catalog.yaml')).toThrow('Invalid time type entry: 42');
    });
  });
});
