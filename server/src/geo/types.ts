export type GeoLocation = {
  /** Canonical display name, e.g. "Mumbai". */
  name: string;
  aliases: string[];
  /** ISO 3166-1 alpha-2, upper case. */
  country: string;
  lat: number;
  lon: number;
  /** IANA zone, e.g. "Asia/Kolkata". */
  timezone: string;
  /** Tie-break weight; population for GeoNames data. */
  priority: number;
};

export type GeoMatch = {
  location: GeoLocation;
  /** The normalized name (canonical or alias) that produced the hit. */
  matched: string;
  exact: boolean;
};
