/**
 * ClientRegistry: an immutable, indexed snapshot of client records.
 *
 * Indices are built once in the constructor. Duplicate keys are kept as
 * multi-value entries in load order; single-value lookups return the
 * first-loaded client (first wins) and the find-all variants expose every
 * collision.
 */

import { normalizeAddress } from '../matching/normalizeAddress';
import { partialRatio } from '../matching/stringSimilarity';
import {
  BUSINESS_NUMBER_FIELDS,
  MIN_ADDRESS_INPUT_LENGTH,
  POSTCODE_EXACT_SCORE,
  SUBURB_CONTAINMENT_SCORE,
} from '../matching/constants';
import type {
  AddressMatch,
  AddressStrategy,
  ClientLocation,
  ClientRecord,
  RegistryMetadata,
  RegistryStats,
} from './types';

type MultiIndex = Map<string, string[]>;

const addTo = (index: MultiIndex, key: string, clientId: string): void => {
  const existing = index.get(key);
  if (existing) {
    if (!existing.includes(clientId)) existing.push(clientId);
  } else {
    index.set(key, [clientId]);
  }
};

export const digitsOnly = (value: string): string => value.replace(/\D/g, '');

/** "given family", trimmed; empty when the record has neither */
export const fullName = (client: ClientRecord): string =>
  `${client.personalInfo.givenName} ${client.personalInfo.familyName}`.trim();

/** Unit, street, suburb, postcode joined in that order, skipping absent parts */
export const formatAddress = (location: ClientLocation): string =>
  [location.unit, location.street, location.suburb, location.postcode]
    .filter((part): part is string => Boolean(part))
    .join(' ');

export class ClientRegistry {
  readonly metadata: RegistryMetadata;
  readonly loadedAt: Date;

  private readonly records: readonly ClientRecord[];
  private readonly byId = new Map<string, ClientRecord>();
  private readonly emailIndex: MultiIndex = new Map();
  private readonly nameIndex: MultiIndex = new Map();
  private readonly platformIndex = new Map<string, MultiIndex>();
  private readonly phoneIndex: MultiIndex = new Map();
  private readonly businessNumberIndex: MultiIndex = new Map();

  constructor(records: readonly ClientRecord[], metadata: RegistryMetadata = {}) {
    this.records = Object.freeze([...records]);
    this.metadata = Object.freeze({ ...metadata });
    this.loadedAt = new Date();

    for (const client of this.records) {
      this.index(client);
    }
  }

  private index(client: ClientRecord): void {
    const { clientId, personalInfo } = client;
    this.byId.set(clientId, client);

    for (const email of personalInfo.emails) {
      addTo(this.emailIndex, email.toLowerCase(), clientId);
    }

    const name = fullName(client);
    if (name) {
      addTo(this.nameIndex, name.toLowerCase(), clientId);
    }

    for (const phone of personalInfo.phoneNumbers) {
      const digits = digitsOnly(phone);
      if (digits) addTo(this.phoneIndex, digits, clientId);
    }

    for (const entry of client.platformIdentifiers) {
      let platformIds = this.platformIndex.get(entry.platform);
      if (!platformIds) {
        platformIds = new Map();
        this.platformIndex.set(entry.platform, platformIds);
      }
      if (entry.clientIdOnPlatform) {
        addTo(platformIds, entry.clientIdOnPlatform, clientId);
      }
      if (entry.displayName) {
        addTo(platformIds, entry.displayName.toLowerCase(), clientId);
      }

      for (const field of BUSINESS_NUMBER_FIELDS) {
        const value = entry.extra[field];
        if (value) addTo(this.businessNumberIndex, value, clientId);
      }
    }
  }

  get size(): number {
    return this.records.length;
  }

  /** All clients in load order */
  clients(): readonly ClientRecord[] {
    return this.records;
  }

  getClient(clientId: string): ClientRecord | undefined {
    return this.byId.get(clientId);
  }

  findByEmail(email: string): string | undefined {
    return this.findAllByEmail(email)[0];
  }

  findAllByEmail(email: string): readonly string[] {
    if (!email) return [];
    return this.emailIndex.get(email.trim().toLowerCase()) ?? [];
  }

  /** Exact, case-insensitive lookup on "given family" */
  findByName(name: string): readonly string[] {
    if (!name) return [];
    return this.nameIndex.get(name.trim().toLowerCase()) ?? [];
  }

  /** Tries the identifier as given, then lowercased (display names are indexed lowercased) */
  findByPlatformIdentifier(platform: string, identifier: string): string | undefined {
    const platformIds = this.platformIndex.get(platform);
    if (!platformIds || !identifier) return undefined;
    return (platformIds.get(identifier) ?? platformIds.get(identifier.toLowerCase()))?.[0];
  }

  /** Digits-only comparison, so "0412 345 678" equals "0412-345-678" */
  findByPhone(phone: string): string | undefined {
    const digits = digitsOnly(phone ?? '');
    return digits ? this.phoneIndex.get(digits)?.[0] : undefined;
  }

  findByBusinessNumber(businessNumber: string): string | undefined {
    const key = businessNumber?.trim();
    return key ? this.businessNumberIndex.get(key)?.[0] : undefined;
  }

  /**
   * Registry-wide address search.
   *
   * Each client with a location is scored by up to four strategies
   * (full address, street only, suburb containment, postcode literal) and
   * keeps its best score. The highest-scoring client at or above minScore
   * wins; on equal scores the client loaded first is kept.
   */
  findByAddress(freeText: string | null | undefined, minScore: number): AddressMatch | undefined {
    if (!freeText || freeText.trim().length < MIN_ADDRESS_INPUT_LENGTH) {
      return undefined;
    }

    const normalizedInput = normalizeAddress(freeText);
    if (!normalizedInput) {
      return undefined;
    }

    let best: AddressMatch | undefined;

    for (const client of this.records) {
      const { location } = client;
      const matchedAddress = formatAddress(location);
      if (!matchedAddress) continue;

      const scores: Partial<Record<AddressStrategy, number>> = {};
      const ranked: Array<[AddressStrategy, number]> = [];
      const record = (strategy: AddressStrategy, value: number): void => {
        scores[strategy] = value;
        ranked.push([strategy, value]);
      };

      record('full_address', partialRatio(normalizedInput, normalizeAddress(matchedAddress)));

      if (location.street) {
        record('street_only', partialRatio(normalizedInput, normalizeAddress(location.street)));
      }

      const suburb = normalizeAddress(location.suburb);
      if (suburb && normalizedInput.includes(suburb)) {
        record('suburb_match', SUBURB_CONTAINMENT_SCORE);
      }

      if (location.postcode && freeText.includes(location.postcode)) {
        record('postcode_match', POSTCODE_EXACT_SCORE);
      }

      // First strategy holding the maximum names the match
      const [matchStrategy, score] = ranked.reduce((top, entry) => (entry[1] > top[1] ? entry : top));

      if (score >= minScore && score > 0 && (!best || score > best.score)) {
        best = {
          clientId: client.clientId,
          score,
          details: {
            matchedAddress,
            matchStrategy,
            inputAddress: freeText,
            normalizedInput,
            clientLocation: location,
            allScores: scores,
          },
        };
      }
    }

    return best;
  }

  stats(): RegistryStats {
    const platforms: Record<string, number> = {};
    for (const [platform, ids] of this.platformIndex) {
      platforms[platform] = ids.size;
    }

    return {
      clients: this.records.length,
      emails: this.emailIndex.size,
      names: this.nameIndex.size,
      platforms,
      phones: this.phoneIndex.size,
      businessNumbers: this.businessNumberIndex.size,
    };
  }
}

export default ClientRegistry;
