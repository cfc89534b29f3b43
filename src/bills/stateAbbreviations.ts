// Full state name (as written in the tracker export) to USPS code
export const STATE_ABBREVIATIONS: Readonly<Record<string, string>> = Object.freeze({
  'Alabama': 'AL',
  'Alaska': 'AK',
  'Arizona': 'AZ',
  'Arkansas': 'AR',
  'California': 'CA',
  'Colorado': 'CO',
  'Connecticut': 'CT',
  'Delaware': 'DE',
  'Florida': 'FL',
  'Georgia': 'GA',
  'Hawaii': 'HI',
  'Idaho': 'ID',
  'Illinois': 'IL',
  'Indiana': 'IN',
  'Iowa': 'IA',
  'Kansas': 'KS',
  'Kentucky': 'KY',
  'Louisiana': 'LA',
  'Maine': 'ME',
  'Maryland': 'MD',
  'Massachusetts': 'MA',
  'Michigan': 'MI',
  'Minnesota': 'MN',
  'Mississippi': 'MS',
  'Missouri': 'MO',
  'Montana': 'MT',
  'Nebraska': 'NE',
  'Nevada': 'NV',
  'New Hampshire': 'NH',
  'New Jersey': 'NJ',
  'New Mexico': 'NM',
  'New York': 'NY',
  'North Carolina': 'NC',
  'North Dakota': 'ND',
  'Ohio': 'OH',
  'Oklahoma': 'OK',
  'Oregon': 'OR',
  'Pennsylvania': 'PA',
  'Rhode Island': 'RI',
  'South Carolina': 'SC',
  'South Dakota': 'SD',
  'Tennessee': 'TN',
  'Texas': 'TX',
  'Utah': 'UT',
  'Vermont': 'VT',
  'Virginia': 'VA',
  'Washington': 'WA',
  'West Virginia': 'WV',
  'Wisconsin': 'WI',
  'Wyoming': 'WY',
  'District of Columbia': 'DC',
});

/**
 * Resolve a full state name to its two-letter code.
 *
 * Unknown names fall back to their first two characters, uppercased.
 * This is an approximation (e.g. "Guam" -> "GU" happens to work,
 * "Puerto Rico" -> "PU" does not).
 */
export function resolveStateAbbreviation(stateName: string): string {
  // own keys only: 'constructor' or 'toString' must not hit Object.prototype
  if (Object.hasOwn(STATE_ABBREVIATIONS, stateName)) {
    return STATE_ABBREVIATIONS[stateName];
  }
  return stateName.slice(0, 2).toUpperCase();
}
