/**
 * Client registry record types.
 *
 * Records are frozen when a snapshot is built and never change afterwards;
 * a reload produces a new snapshot instead.
 */

export interface PersonalInfo {
  readonly givenName: string;
  readonly familyName: string;
  readonly emails: readonly string[];
  readonly phoneNumbers: readonly string[];
}

/** Every component is optional; an empty location is never address-matched. */
export interface ClientLocation {
  /** Unit / first address line ("Unit 4") */
  readonly unit?: string;
  /** Street line ("12 Smith St") */
  readonly street?: string;
  readonly suburb?: string;
  readonly postcode?: string;
}

export interface PlatformIdentifier {
  readonly platform: string;
  readonly clientIdOnPlatform?: string;
  readonly displayName?: string;
  /** Platform-specific fields such as `acn` or `abn` */
  readonly extra: Readonly<Record<string, string>>;
}

export interface ClientRecord {
  readonly clientId: string;
  readonly personalInfo: PersonalInfo;
  readonly location: ClientLocation;
  readonly platformIdentifiers: readonly PlatformIdentifier[];
}

export type AddressStrategy = 'full_address' | 'street_only' | 'suburb_match' | 'postcode_match';

export interface AddressMatchDetails {
  readonly matchedAddress: string;
  readonly matchStrategy: AddressStrategy;
  readonly inputAddress: string;
  readonly normalizedInput: string;
  readonly clientLocation: ClientLocation;
  readonly allScores: Readonly<Partial<Record<AddressStrategy, number>>>;
}

export interface AddressMatch {
  readonly clientId: string;
  readonly score: number;
  readonly details: AddressMatchDetails;
}

export interface RegistryMetadata {
  readonly [key: string]: unknown;
}

export interface RegistryStats {
  clients: number;
  emails: number;
  names: number;
  platforms: Record<string, number>;
  phones: number;
  businessNumbers: number;
}
