/**
 * IATA codes for the cities the sample inventory knows about.
 */
const CITY_CODES: Readonly<Record<string, string>> = {
  delhi: 'DEL',
  'new delhi': 'DEL',
  bangalore: 'BLR',
  bengaluru: 'BLR',
  mumbai: 'BOM',
  bombay: 'BOM',
  chennai: 'MAA',
  kolkata: 'CCU',
  hyderabad: 'HYD',
  pune: 'PNQ',
  goa: 'GOI',
  jaipur: 'JAI',
  'new york': 'JFK',
  london: 'LHR',
  dubai: 'DXB',
  singapore: 'SIN',
};

/**
 * Unknown cities fall back to the first three letters, upper-cased.
 */
export function toAirportCode(city: string): string {
  const key = city.trim().toLowerCase();
  return CITY_CODES[key] ?? key.replace(/\s+/g, '').slice(0, 3).toUpperCase();
}
