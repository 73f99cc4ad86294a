import { open, type CountryResponse, type Reader } from "maxmind";
import { CollaboratorUnavailableError, describeError } from "../errors.js";
import { createSubsystemLogger } from "../logging/subsystem.js";

const log = createSubsystemLogger("metrics/geo");

export const UNKNOWN_COUNTRY = "unknown";

/**
 * IP to ISO country code. Must answer UNKNOWN_COUNTRY rather than fail.
 */
export type GeoResolver = {
  lookup(ip: string): string | Promise<string>;
};

/**
 * Fixed table, for tests and for running without a GeoIP database.
 */
export class StaticGeoResolver implements GeoResolver {
  private readonly table: Map<string, string>;

  constructor(table: Record<string, string> = {}) {
    this.table = new Map(Object.entries(table));
  }

  lookup(ip: string): string {
    return this.table.get(ip) ?? UNKNOWN_COUNTRY;
  }
}

/**
 * Reads a MaxMind GeoLite2 Country or City database.
 */
export class MaxmindGeoResolver implements GeoResolver {
  private readonly reader: Reader<CountryResponse>;

  private constructor(reader: Reader<CountryResponse>) {
    this.reader = reader;
  }

  static async open(dbPath: string): Promise<MaxmindGeoResolver> {
    try {
      return new MaxmindGeoResolver(await open<CountryResponse>(dbPath));
    } catch (err) {
      throw new CollaboratorUnavailableError(
        "geolocation",
        `Cannot open GeoIP database ${dbPath}: ${describeError(err)}`,
        { cause: err },
      );
    }
  }

  lookup(ip: string): string {
    try {
      const record = this.reader.get(ip);
      return record?.country?.iso_code ?? record?.registered_country?.iso_code ?? UNKNOWN_COUNTRY;
    } catch (err) {
      log.debug(`GeoIP lookup failed for ${ip}: ${describeError(err)}`);
      return UNKNOWN_COUNTRY;
    }
  }
}

/**
 * Memoizes another resolver per IP. The cache only lives as long as this
 * object and can be dropped at any time.
 */
export class CachedGeoResolver implements GeoResolver {
  private readonly inner: GeoResolver;
  private readonly cache = new Map<string, string>();

  constructor(inner: GeoResolver) {
    this.inner = inner;
  }

  async lookup(ip: string): Promise<string> {
    const cached = this.cache.get(ip);
    if (cached !== undefined) {
      return cached;
    }
    let country: string;
    try {
      country = await this.inner.lookup(ip);
    } catch (err) {
      log.warn(`Geolocation unavailable for ${ip}: ${describeError(err)}`);
      country = UNKNOWN_COUNTRY;
    }
    this.cache.set(ip, country);
    return country;
  }

  clear(): void {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }
}

/**
 * Opens the configured database, degrading to "unknown" for every IP when
 * it is missing or unreadable.
 */
export async function createGeoResolver(dbPath: string): Promise<CachedGeoResolver> {
  try {
    return new CachedGeoResolver(await MaxmindGeoResolver.open(dbPath));
  } catch (err) {
    log.warn(`${describeError(err)}; countries will be reported as ${UNKNOWN_COUNTRY}`);
    return new CachedGeoResolver(new StaticGeoResolver());
  }
}
