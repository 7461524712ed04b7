import COUNTRIES from "../data/countries.json";

export interface Country {
  iso2: string;
  name: string;
  iso3?: string | null;
  local_name?: string | null;
  region?: string | null;
}

/** ISO 3166-1 alpha-2 lookup handed to waypoints and the CUP codec. */
export interface CountryLookup {
  getByIso2(iso2: string): Country | undefined;
}

export class CountryTable implements CountryLookup {
  private readonly byIso2 = new Map<string, Country>();

  constructor(countries: Iterable<Country>) {
    for (const c of countries) this.byIso2.set(c.iso2.toUpperCase(), c);
  }

  getByIso2(iso2: string): Country | undefined {
    return this.byIso2.get(iso2.trim().toUpperCase());
  }

  get size(): number {
    return this.byIso2.size;
  }
}

/** Table built from the bundled ISO list (used when the directory is not configured). */
export function loadCountries(): CountryTable {
  return new CountryTable(COUNTRIES);
}
