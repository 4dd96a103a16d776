import { Injectable } from '@nestjs/common';
import { z } from 'zod';

import rawTable from './data/contacts.json';
import {
  ContactRecord,
  ContactRecordSchema,
  DisasterTypeSchema,
} from '../../shared/types/schemas';

const ContactListSchema = z.array(ContactRecordSchema).min(1);
const CountryCodeSchema = z.string().regex(/^[A-Z]{2}$/);

const CountrySchema = z
  .object({
    name: z.string().min(1),
    contacts: z
      .object({ default: ContactListSchema })
      .catchall(ContactListSchema),
  })
  .superRefine((country, ctx) => {
    for (const key of Object.keys(country.contacts)) {
      if (key !== 'default' && !DisasterTypeSchema.safeParse(key).success) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `unknown disaster type "${key}"`,
          path: ['contacts', key],
        });
      }
    }
  });

const ContactTableSchema = z.object({
  universal_fallback: ContactListSchema,
  aliases: z.record(CountryCodeSchema),
  countries: z.record(CountryCodeSchema, CountrySchema),
});

export type CountryEntry = {
  code: string;
  name: string;
  defaults: readonly ContactRecord[];
  byType: ReadonlyMap<string, readonly ContactRecord[]>;
};

const freezeList = (records: ContactRecord[]): readonly ContactRecord[] =>
  Object.freeze(records.map((record) => Object.freeze({ ...record })));

/**
 * Static emergency-number table, parsed and frozen once at start-up. Nothing
 * writes to it at runtime.
 */
@Injectable()
export class ContactsRepo {
  private readonly countries = new Map<string, CountryEntry>();
  private readonly aliases = new Map<string, string>();
  private readonly universalFallback: readonly ContactRecord[];

  constructor() {
    const table = ContactTableSchema.parse(rawTable);

    this.universalFallback = freezeList(table.universal_fallback);

    for (const [alias, code] of Object.entries(table.aliases)) {
      this.aliases.set(alias.toLowerCase(), code);
    }

    for (const [code, country] of Object.entries(table.countries)) {
      const { default: defaults, ...byType } = country.contacts;
      this.countries.set(code, {
        code,
        name: country.name,
        defaults: freezeList(defaults),
        byType: new Map(
          Object.entries(byType).map(([type, records]) => [
            type,
            freezeList(records),
          ]),
        ),
      });
    }
  }

  /**
   * "in", "India" and "IN" all resolve to "IN". Unknown input is upper-cased.
   */
  resolveCountryCode(country: string): string {
    const trimmed = country.trim();
    const upper = trimmed.toUpperCase();
    if (this.countries.has(upper)) return upper;
    return this.aliases.get(trimmed.toLowerCase()) ?? upper;
  }

  getCountry(code: string): CountryEntry | null {
    return this.countries.get(code) ?? null;
  }

  getUniversalFallback(): readonly ContactRecord[] {
    return this.universalFallback;
  }

  listCountryCodes(): string[] {
    return [...this.countries.keys()].sort();
  }
}
