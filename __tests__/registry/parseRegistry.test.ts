/**
 * Tests for registry snapshot parsing
 */

import { parseRegistry } from '../../src/registry/parseRegistry';
import { RegistryFormatError } from '../../src/utils/AppError';

describe('parseRegistry', () => {
  describe('flat map form', () => {
    it('should use the keys as client ids and default missing fields', () => {
      const { metadata, records } = parseRegistry({
        A: { personal_info: { given_name: ' Ann ', emails: ['ann@test', null, ''] } },
        B: {},
      });

      expect(metadata).toEqual({});
      expect(records.map((r) => r.clientId)).toEqual(['A', 'B']);
      expect(records[0].personalInfo).toEqual({
        givenName: 'Ann',
        familyName: '',
        emails: ['ann@test'],
        phoneNumbers: [],
      });
      expect(records[1].location).toEqual({});
      expect(records[1].platformIdentifiers).toEqual([]);
    });
  });

  describe('envelope form', () => {
    it('should read ids from client_id or id and keep metadata', () => {
      const { metadata, records } = parseRegistry({
        metadata: { source: 'crm' },
        clients: [{ client_id: 'X1' }, { id: 7, location: { postcode: 2000 } }],
      });

      expect(metadata).toEqual({ source: 'crm' });
      expect(records.map((r) => r.clientId)).toEqual(['X1', '7']);
      expect(records[1].location.postcode).toBe('2000');
    });

    it('should read ids from caura_id', () => {
      const { records } = parseRegistry({
        metadata: {},
        clients: [{ caura_id: 'CL00001', personal_info: { given_name: 'Ann' } }],
      });

      expect(records[0].clientId).toBe('CL00001');
      expect(records[0].personalInfo.givenName).toBe('Ann');
    });

    it('should prefer client_id over caura_id', () => {
      const { records } = parseRegistry({
        clients: [{ client_id: 'X1', caura_id: 'CL00001' }],
      });

      expect(records[0].clientId).toBe('X1');
    });

    it('should accept identifiers nested or inline', () => {
      const { records } = parseRegistry({
        clients: [
          {
            client_id: 'P1',
            platform_identifiers: [
              { platform: 'xero', identifiers: { client_id: 44, display_name: 'P One' } },
              { platform: 'invoicing', abn: '51824753556' },
            ],
          },
        ],
      });

      const [xero, invoicing] = records[0].platformIdentifiers;
      expect(xero.platform).toBe('xero');
      expect(xero.clientIdOnPlatform).toBe('44');
      expect(xero.displayName).toBe('P One');
      expect(xero.extra).toEqual({});
      expect(invoicing.clientIdOnPlatform).toBeUndefined();
      expect(invoicing.extra).toEqual({ abn: '51824753556' });
    });

    it('should reject a client without an id', () => {
      expect(() => parseRegistry({ clients: [{ personal_info: {} }] })).toThrow(
        'Registry client at position 0 has no client_id'
      );
    });

    it('should reject a non-array clients field', () => {
      expect(() => parseRegistry({ clients: {} })).toThrow('"clients" must be an array');
    });
  });

  describe('errors', () => {
    it('should reject values that are not objects', () => {
      expect(() => parseRegistry([])).toThrow(RegistryFormatError);
      expect(() => parseRegistry('clients')).toThrow(/^Invalid client registry format/);
    });

    it('should reject duplicate client ids', () => {
      expect(() => parseRegistry({ clients: [{ client_id: 'A' }, { client_id: ' A ' }] })).toThrow(
        'Duplicate client id "A" in registry'
      );
    });

    it('should reject an entry that is not an object', () => {
      expect(() => parseRegistry({ A: 'nope' })).toThrow('Registry entry "A" is not an object');
    });

    it('should name the path of a malformed sub-field', () => {
      expect(() => parseRegistry({ A: { personal_info: { emails: 'x@test' } } })).toThrow(
        'Registry entry "A" is malformed at personal_info.emails'
      );
    });

    it('should carry a 422 status', () => {
      let caught: unknown;
      try {
        parseRegistry(null);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(RegistryFormatError);
      expect(caught).toMatchObject({ statusCode: 422 });
    });
  });
});
