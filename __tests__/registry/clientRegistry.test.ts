/**
 * Tests for ClientRegistry indices and lookups
 */

import { ClientRegistry, formatAddress, fullName } from '../../src/registry/clientRegistry';
import { parseRegistry } from '../../src/registry/parseRegistry';
import { fixtureRegistry } from '../helpers';

describe('ClientRegistry', () => {
  const registry = fixtureRegistry();

  describe('snapshot', () => {
    it('should keep clients in load order', () => {
      expect(registry.size).toBe(6);
      expect(registry.clients().map((c) => c.clientId)).toEqual(['C1', 'C2', 'C3', 'C4', 'C5', 'C6']);
    });

    it('should expose the envelope metadata', () => {
      expect(registry.metadata).toEqual({
        source: 'test-fixture',
        exported_at: '2024-05-01T00:00:00Z',
      });
    });

    it('should freeze records', () => {
      const client = registry.getClient('C1');

      expect(client).toBeDefined();
      expect(Object.isFrozen(client)).toBe(true);
      expect(Object.isFrozen(client?.personalInfo.emails)).toBe(true);
    });

    it('should return undefined for unknown ids', () => {
      expect(registry.getClient('C99')).toBeUndefined();
    });

    it('should report index sizes', () => {
      expect(registry.stats()).toEqual({
        clients: 6,
        emails: 5,
        names: 5,
        platforms: { stripe: 2, invoicing: 0, xero: 1 },
        phones: 2,
        businessNumbers: 2,
      });
    });
  });

  describe('email lookup', () => {
    it('should match case-insensitively after trimming', () => {
      expect(registry.findByEmail(' A@X.com ')).toBe('C1');
    });

    it('should return the first-loaded client on collisions', () => {
      expect(registry.findByEmail('shared@family.test')).toBe('C5');
      expect(registry.findAllByEmail('SHARED@family.test')).toEqual(['C5', 'C6']);
    });

    it('should return nothing for empty or unknown input', () => {
      expect(registry.findByEmail('')).toBeUndefined();
      expect(registry.findAllByEmail('nobody@none.test')).toEqual([]);
    });
  });

  describe('name lookup', () => {
    it('should match "given family" exactly, ignoring case', () => {
      expect(registry.findByName('BOB CARTER')).toEqual(['C2']);
      expect(registry.findByName('emma stone')).toEqual(['C5', 'C6']);
      expect(registry.findByName('Bob')).toEqual([]);
    });
  });

  describe('platform identifiers', () => {
    it('should find by platform client id', () => {
      expect(registry.findByPlatformIdentifier('stripe', 'cus_A1')).toBe('C1');
      expect(registry.findByPlatformIdentifier('xero', 'XR-44')).toBe('C4');
    });

    it('should find by display name regardless of case', () => {
      expect(registry.findByPlatformIdentifier('stripe', 'Alice Nguyen')).toBe('C1');
    });

    it('should scope identifiers to their platform', () => {
      expect(registry.findByPlatformIdentifier('xero', 'cus_A1')).toBeUndefined();
      expect(registry.findByPlatformIdentifier('unknown', 'cus_A1')).toBeUndefined();
    });
  });

  describe('phone and business number lookup', () => {
    it('should compare phone digits only', () => {
      expect(registry.findByPhone('0412-345-678')).toBe('C1');
      expect(registry.findByPhone('+61400111222')).toBe('C3');
      expect(registry.findByPhone('no digits')).toBeUndefined();
    });

    it('should find ACN and ABN values', () => {
      expect(registry.findByBusinessNumber('123456789')).toBe('C3');
      expect(registry.findByBusinessNumber(' 51824753556 ')).toBe('C4');
      expect(registry.findByBusinessNumber('')).toBeUndefined();
    });
  });

  describe('address lookup', () => {
    it('should ignore input shorter than five characters', () => {
      expect(registry.findByAddress('Kew', 0.7)).toBeUndefined();
      expect(registry.findByAddress(undefined, 0.7)).toBeUndefined();
    });

    it('should score every strategy and keep the best', () => {
      const match = registry.findByAddress('Unit 4/7 Jones Rd Kew', 0.7);

      expect(match?.clientId).toBe('C4');
      expect(match?.score).toBe(1);
      expect(match?.details.matchStrategy).toBe('full_address');
      expect(match?.details.normalizedInput).toBe('u 4 7 jones road kew');
      expect(match?.details.allScores).toEqual({
        full_address: 1,
        street_only: 1,
        suburb_match: 0.85,
      });
    });

    it('should match a literal postcode', () => {
      const match = registry.findByAddress('Deposit 3101', 0.7);

      expect(match?.clientId).toBe('C4');
      expect(match?.details.matchStrategy).toBe('postcode_match');
      expect(match?.score).toBe(0.9);
    });

    it('should keep the first-loaded client on a tie', () => {
      const glebe = { location: { suburb: 'Glebe' } };
      const forward = new ClientRegistry(parseRegistry({ A: glebe, B: glebe }).records);
      const reversed = new ClientRegistry(parseRegistry({ B: glebe, A: glebe }).records);

      expect(forward.findByAddress('Transfer Glebe', 0.7)).toMatchObject({ clientId: 'A', score: 1 });
      expect(reversed.findByAddress('Transfer Glebe', 0.7)).toMatchObject({ clientId: 'B', score: 1 });
    });
  });

  describe('helpers', () => {
    it('should format names and addresses', () => {
      const c3 = registry.getClient('C3');
      const c4 = registry.getClient('C4');

      expect(c3 && fullName(c3)).toBe('Chloe Park');
      expect(c4 && formatAddress(c4.location)).toBe('Unit 4 7 Jones Rd Kew 3101');
      expect(formatAddress({})).toBe('');
    });
  });
});
