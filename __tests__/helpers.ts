import { readFileSync } from 'fs';
import { join } from 'path';
import { Readable } from 'stream';
import { ClientRegistry } from '../src/registry/clientRegistry';
import { parseRegistry } from '../src/registry/parseRegistry';
import type { Transaction } from '../src/matching/types';

export const FIXTURE_REGISTRY_PATH = join(__dirname, 'fixtures', 'clients.json');

export const fixtureData = (): unknown => JSON.parse(readFileSync(FIXTURE_REGISTRY_PATH, 'utf8'));

export const fixtureRegistry = (): ClientRegistry => {
  const { records, metadata } = parseRegistry(fixtureData());
  return new ClientRegistry(records, metadata);
};

export const createTransaction = (overrides: Partial<Transaction> = {}): Transaction => ({
  transactionId: 'T1',
  date: new Date('2024-05-01T00:00:00Z'),
  amount: 100,
  description: '',
  platform: 'bank_statement',
  platformMetadata: {},
  ...overrides,
});

export const csvStream = (text: string): Readable => Readable.from([Buffer.from(text)]);
