import { DISASTER_TYPES, DisasterType } from '../types/schemas';

const isDisasterType = (value: string): value is DisasterType =>
  (DISASTER_TYPES as readonly string[]).includes(value);

// First match wins, so compound labels ("collapse after earthquake") resolve
// to the more specific response type.
type KeywordRule = readonly [DisasterType, readonly string[]];

const KEYWORD_RULES: readonly KeywordRule[] = [
  ['chemical_leak', ['chemical', 'gas leak', 'toxic', 'hazmat', 'spill']],
  ['building_collapse', ['collapse', 'rubble', 'structural failure']],
  ['road_accident', ['accident', 'crash', 'collision', 'vehicle', 'traffic']],
  ['flood', ['flood', 'inundation', 'tsunami', 'storm surge']],
  ['fire', ['fire', 'blaze', 'burning', 'smoke']],
  ['earthquake', ['earthquake', 'quake', 'seismic']],
  ['landslide', ['landslide', 'mudslide', 'rockfall', 'avalanche']],
  ['storm', ['storm', 'cyclone', 'hurricane', 'typhoon', 'tornado']],
];

/**
 * Maps a free-text disaster label onto the canonical types the contact
 * directory is keyed by. "Structural Fire" -> fire, "Flash Flood" -> flood.
 */
export const normalizeDisasterType = (label: string): DisasterType => {
  const key = label.trim().toLowerCase().replace(/[\s-]+/g, '_');
  if (isDisasterType(key)) return key;

  const text = key.replace(/_/g, ' ');
  for (const [type, keywords] of KEYWORD_RULES) {
    if (keywords.some((keyword) => text.includes(keyword))) return type;
  }
  return 'other';
};
