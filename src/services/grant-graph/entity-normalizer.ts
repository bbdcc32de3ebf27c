/**
 * Entity Normalizer
 *
 * Turns raw delimited record fields into canonical entity names.
 *
 * @module services/grant-graph/entity-normalizer
 */

import type { PersonRole } from '../../models/grant-graph.js';

export const ENTRY_DELIMITER = ';';

const CO_PI_MARKERS = ['(CoPI)', '(Co-PI)'] as const;
const PI_MARKER = '(PI)';

export interface ParsedPerson {
  name: string;
  role: PersonRole;
}

function stripMarker(text: string, marker: string): string {
  return text.split(marker).join('');
}

/**
 * Parse a PI/CoPI field such as `"Jane Doe (PI); John Roe (Co-PI)"`.
 *
 * Role markers are exact, case-sensitive substrings. A co-PI marker wins
 * over a PI marker; no marker means PI. Every marker is removed from the
 * name, and entries that are empty once stripped are discarded.
 */
export function parsePeople(text: string): ParsedPerson[] {
  const people: ParsedPerson[] = [];

  for (const rawEntry of text.split(ENTRY_DELIMITER)) {
    const entry = rawEntry.trim();
    if (!entry) continue;

    const role: PersonRole = CO_PI_MARKERS.some((marker) => entry.includes(marker)) ? 'CoPI' : 'PI';

    let name = entry;
    for (const marker of [...CO_PI_MARKERS, PI_MARKER]) {
      name = stripMarker(name, marker);
    }
    name = name.trim();
    if (!name) continue;

    people.push({ name, role });
  }

  return people;
}

/**
 * Split a semicolon-delimited list (programs, technology areas), trimming
 * each value and dropping blanks.
 */
export function splitDelimitedList(text: string): string[] {
  return text
    .split(ENTRY_DELIMITER)
    .map((value) => value.trim())
    .filter((value) => value.length > 0);
}

/**
 * County identifiers carry their state so that same-named counties in
 * different states stay distinct.
 */
export function countyIdentifier(county: string, state: string | undefined): string {
  return state ? `${county}, ${state}` : county;
}
