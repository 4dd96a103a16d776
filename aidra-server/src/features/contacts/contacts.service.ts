import { Injectable, Logger } from '@nestjs/common';

import { ContactRecord, DisasterType } from '../../shared/types/schemas';
import { ContactsRepo } from './contacts.repo';

export type ContactMatch = 'exact' | 'country_default' | 'universal_fallback';

export type ContactLookup = {
  country_code: string;
  disaster_type: DisasterType;
  match: ContactMatch;
  records: ContactRecord[];
};

const copyRecords = (records: readonly ContactRecord[]): ContactRecord[] =>
  records.map((record) => ({ ...record }));

/**
 * The only source of phone numbers in a report. Pure: the same
 * (disaster type, country) always yields the same records.
 */
@Injectable()
export class ContactsService {
  private readonly logger = new Logger(ContactsService.name);

  constructor(private readonly repo: ContactsRepo) {}

  lookup(disasterType: DisasterType, country: string): ContactLookup {
    const countryCode = this.repo.resolveCountryCode(country);
    const entry = this.repo.getCountry(countryCode);

    if (!entry) {
      this.logger.debug(
        `No contacts for country "${country}", using universal fallback`,
      );
      return {
        country_code: countryCode,
        disaster_type: disasterType,
        match: 'universal_fallback',
        records: copyRecords(this.repo.getUniversalFallback()),
      };
    }

    const exact = entry.byType.get(disasterType);
    return {
      country_code: entry.code,
      disaster_type: disasterType,
      match: exact ? 'exact' : 'country_default',
      records: copyRecords(exact ?? entry.defaults),
    };
  }

  supportedCountries(): string[] {
    return this.repo.listCountryCodes();
  }
}
