import { ContactsRepo } from './contacts.repo';
import { ContactsService } from './contacts.service';

describe('ContactsService', () => {
  let service: ContactsService;

  beforeEach(() => {
    service = new ContactsService(new ContactsRepo());
  });

  it('returns the exact entry for a known country and disaster type', () => {
    const result = service.lookup('fire', 'IN');

    expect(result).toEqual({
      country_code: 'IN',
      disaster_type: 'fire',
      match: 'exact',
      records: [
        { service_name: 'Fire Brigade', phone_number: '101' },
        { service_name: 'Ambulance', phone_number: '102' },
        { service_name: 'Police', phone_number: '100' },
      ],
    });
  });

  it('resolves country names and lower-case codes', () => {
    expect(service.lookup('flood', 'India').country_code).toBe('IN');
    expect(service.lookup('flood', 'usa').country_code).toBe('US');
    expect(service.lookup('flood', 'in').country_code).toBe('IN');
  });

  it("falls back to the country's default list for an unlisted type", () => {
    const result = service.lookup('earthquake', 'US');

    expect(result.match).toBe('country_default');
    expect(result.records).toEqual([
      { service_name: 'Emergency', phone_number: '911' },
    ]);
  });

  it('falls back to the universal number for an unknown country', () => {
    const result = service.lookup('fire', 'ZZ');

    expect(result).toEqual({
      country_code: 'ZZ',
      disaster_type: 'fire',
      match: 'universal_fallback',
      records: [
        {
          service_name: 'International Emergency Number',
          phone_number: '112',
        },
      ],
    });
  });

  it('is deterministic and hands out copies of the table', () => {
    const first = service.lookup('flood', 'US');
    first.records[0].phone_number = '000';
    first.records.push({ service_name: 'Made up', phone_number: '555' });

    const second = service.lookup('flood', 'US');

    expect(second.records).toEqual([
      { service_name: 'Emergency', phone_number: '911' },
      { service_name: 'FEMA', phone_number: '1-800-621-3362' },
    ]);
    expect(service.lookup('flood', 'US')).toEqual(second);
  });

  it('lists supported countries in code order', () => {
    expect(service.supportedCountries()).toEqual([
      'AU',
      'GB',
      'IN',
      'JP',
      'US',
    ]);
  });
});
