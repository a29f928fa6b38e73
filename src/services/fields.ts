/**
 * Infobox field definitions
 * Each field lists its layouts in the order they are tried
 */

import { FieldDefinition } from '../types/index.js';

export const CURRENT_INCUMBENT = 'Current incumbent';

const FLAGS = 'is';
const DATE = String.raw`[A-Za-z]+\s+\d{1,2},\s+\d{4}`;
const PRESIDENCY = String.raw`President of the United States\s*In office\s*`;
const INCUMBENT = String.raw`Incumbent\s*Assumed office\s*`;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export const FIELDS = {
  birthDate: {
    name: 'birth date',
    group: 'value',
    candidates: [{ pattern: new RegExp(String.raw`Born\D*(?<value>\d{4}-\d{2}-\d{2})`, FLAGS) }],
    missingText: 'Page infobox has no birth information (at least none in xxxx-xx-xx format)'
  },

  incumbencyStart: {
    name: 'incumbency start',
    group: 'value',
    candidates: [
      { pattern: new RegExp(`${PRESIDENCY}(?<value>${DATE})`, FLAGS) },
      { pattern: new RegExp(`${INCUMBENT}(?<value>${DATE})`, FLAGS) },
      { pattern: new RegExp(String.raw`In office\s*(?<value>${DATE})`, FLAGS) }
    ],
    missingText: 'Page infobox has no incumbency start information'
  },

  incumbencyEnd: {
    name: 'incumbency end',
    group: 'value',
    candidates: [
      { pattern: new RegExp(String.raw`${PRESIDENCY}${DATE}\s+(?<value>${DATE})`, FLAGS) },
      // A start date with no end date means the term is ongoing
      { pattern: new RegExp(`${INCUMBENT}${DATE}`, FLAGS), read: () => CURRENT_INCUMBENT },
      { pattern: new RegExp(String.raw`In office\s*${DATE}\s+(?<value>${DATE})`, FLAGS) }
    ],
    missingText: 'Page infobox has no incumbency end information'
  },

  presidentialNumber: {
    name: 'presidential number',
    group: 'value',
    candidates: [
      {
        pattern: new RegExp(
          String.raw`\b(?<value>\d{1,2})(?=(?:st|nd|rd|th)\b(?: & \d{1,2}(?:st|nd|rd|th)\b)? President of the United States)`,
          FLAGS
        )
      }
    ],
    missingText: 'Page infobox has no presidential number information'
  }
} satisfies Record<string, FieldDefinition>;

/**
 * A labelled number followed on the same line by a unit, e.g. "Polar radius 6356.752 km"
 * or "Polar radius 3376.2±0.1 km"; the first number is the value
 */
export function measurementField(label: string, unit: string): FieldDefinition {
  return {
    name: label.toLowerCase(),
    group: 'value',
    candidates: [
      { pattern: new RegExp(String.raw`${escapeRegExp(label)}\D*(?<value>\d[\d,.]*)[^\n]*?\s*${escapeRegExp(unit)}`, FLAGS) }
    ],
    missingText: `Page infobox has no ${label.toLowerCase()} information`
  };
}

export const POLAR_RADIUS = measurementField('Polar radius', 'km');
export const EQUATORIAL_RADIUS = measurementField('Equatorial radius', 'km');
export const MEAN_RADIUS = measurementField('Mean radius', 'km');
