export { ClientRegistry, fullName, formatAddress, digitsOnly } from './clientRegistry';
export { parseRegistry, parseClientRecord } from './parseRegistry';
export type { ParsedRegistry } from './parseRegistry';
export { RegistryStore, registryStore, buildRegistry } from './registryStore';
export type { RegistrySource } from './registryStore';
export type {
  ClientRecord,
  ClientLocation,
  PersonalInfo,
  PlatformIdentifier,
  AddressMatch,
  AddressMatchDetails,
  AddressStrategy,
  RegistryMetadata,
  RegistryStats,
} from './types';
