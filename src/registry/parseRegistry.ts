/**
 * Registry snapshot parsing
 *
 * Accepts either a flat `{ "<id>": record }` map or a
 * `{ metadata, clients: [record] }` envelope in which every record carries
 * its own id (`client_id`, `caura_id` or `id`). Optional sub-fields default to empty.
 */

import { z } from 'zod';
import { RegistryFormatError } from '../utils/AppError';
import type { ClientLocation, ClientRecord, PlatformIdentifier, RegistryMetadata } from './types';

const scalar = z.union([z.string(), z.number()]).transform((value) => String(value).trim());

const optionalText = scalar.nullish().transform((value) => (value ? value : undefined));

const textList = z
  .array(scalar.nullish())
  .nullish()
  .transform((values) => (values ?? []).filter((value): value is string => Boolean(value)));

const platformEntrySchema = z
  .object({
    platform: scalar.nullish().transform((value) => value ?? ''),
    identifiers: z.record(z.unknown()).nullish(),
  })
  .passthrough();

const recordSchema = z.object({
  personal_info: z
    .object({
      given_name: optionalText,
      family_name: optionalText,
      emails: textList,
      contact_numbers: textList,
    })
    .nullish(),
  location: z
    .object({
      address_1: optionalText,
      address_2: optionalText,
      suburb: optionalText,
      postcode: optionalText,
    })
    .nullish(),
  platform_identifiers: z.array(platformEntrySchema).nullish(),
});

export interface ParsedRegistry {
  metadata: RegistryMetadata;
  records: ClientRecord[];
}

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

function toPlatformIdentifier(entry: z.infer<typeof platformEntrySchema>): PlatformIdentifier {
  const { platform, identifiers, ...inline } = entry;
  const fields: Record<string, string> = {};

  // Identifiers may be nested under `identifiers` or written inline on the entry
  for (const [key, value] of Object.entries({ ...inline, ...(identifiers ?? {}) })) {
    if (typeof value === 'string' && value.trim()) {
      fields[key] = value.trim();
    } else if (typeof value === 'number') {
      fields[key] = String(value);
    }
  }

  const { client_id: clientIdOnPlatform, display_name: displayName, ...extra } = fields;

  return Object.freeze({
    platform,
    clientIdOnPlatform,
    displayName,
    extra: Object.freeze(extra),
  });
}

/**
 * Validates one raw record and freezes it as a ClientRecord.
 *
 * @throws RegistryFormatError when the entry is not an object or a
 *   sub-field has the wrong type
 */
export function parseClientRecord(clientId: string, raw: unknown): ClientRecord {
  if (!isPlainObject(raw)) {
    throw new RegistryFormatError(`Registry entry "${clientId}" is not an object`);
  }

  const result = recordSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.errors[0];
    throw new RegistryFormatError(
      `Registry entry "${clientId}" is malformed at ${issue.path.join('.')}: ${issue.message}`
    );
  }

  const { personal_info: info, location, platform_identifiers: platforms } = result.data;

  const clientLocation: ClientLocation = Object.freeze({
    unit: location?.address_1,
    street: location?.address_2,
    suburb: location?.suburb,
    postcode: location?.postcode,
  });

  return Object.freeze({
    clientId,
    personalInfo: Object.freeze({
      givenName: info?.given_name ?? '',
      familyName: info?.family_name ?? '',
      emails: Object.freeze(info?.emails ?? []),
      phoneNumbers: Object.freeze(info?.contact_numbers ?? []),
    }),
    location: clientLocation,
    platformIdentifiers: Object.freeze((platforms ?? []).map(toPlatformIdentifier)),
  });
}

function envelopeId(entry: unknown, position: number): string {
  if (isPlainObject(entry)) {
    const id = entry.client_id ?? entry.caura_id ?? entry.id;
    if ((typeof id === 'string' && id.trim()) || typeof id === 'number') {
      return String(id).trim();
    }
  }
  throw new RegistryFormatError(`Registry client at position ${position} has no client_id`);
}

/**
 * Parses a registry snapshot in either supported shape.
 *
 * @throws RegistryFormatError when the shape is neither, or when a client id
 *   appears twice
 */
export function parseRegistry(data: unknown): ParsedRegistry {
  if (!isPlainObject(data)) {
    throw new RegistryFormatError(
      'Invalid client registry format: expected an object of clients or a { metadata, clients } envelope'
    );
  }

  const entries: Array<[string, unknown]> = [];
  let metadata: RegistryMetadata = {};

  if ('clients' in data) {
    const { clients } = data;
    if (!Array.isArray(clients)) {
      throw new RegistryFormatError('Invalid client registry format: "clients" must be an array');
    }
    if (isPlainObject(data.metadata)) {
      metadata = data.metadata;
    }
    clients.forEach((client: unknown, position) => {
      entries.push([envelopeId(client, position), client]);
    });
  } else {
    entries.push(...Object.entries(data));
  }

  const seen = new Set<string>();
  const records = entries.map(([clientId, raw]) => {
    if (seen.has(clientId)) {
      throw new RegistryFormatError(`Duplicate client id "${clientId}" in registry`);
    }
    seen.add(clientId);
    return parseClientRecord(clientId, raw);
  });

  return { metadata, records };
}
