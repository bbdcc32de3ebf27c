/**
 * Award records matching tests/fixtures/awards-sample.csv after column
 * mapping. The last row has no award ID and is skipped by the builder.
 *
 * @module tests/fixtures/sample-records
 */

import type { AwardRecord } from '../../src/models/grant-graph.js';

export const SAMPLE_RECORDS: readonly AwardRecord[] = [
  {
    awardId: 'AW-001',
    title: 'Solar Cell Research',
    amount: 1000000,
    awardDate: '2023-01-15',
    startDate: '2023-02-01',
    endDate: '2025-01-31',
    active: 'Yes',
    url: 'https://example.org/awards/AW-001',
    people: 'Jane Doe (PI); John Roe (CoPI)',
    organization: 'State University',
    state: 'Ohio',
    county: 'Franklin',
    programs: 'Program Alpha; Program Beta',
    technologyAreas: 'Energy; Advanced Materials',
  },
  {
    awardId: 'AW-002',
    title: 'Battery Storage',
    amount: 500000,
    awardDate: '2023-03-10',
    startDate: '2023-04-01',
    endDate: '2024-03-31',
    active: 'Yes',
    url: 'https://example.org/awards/AW-002',
    people: 'Jane Doe (PI)',
    organization: 'State University',
    state: 'Ohio',
    county: 'Franklin',
    programs: 'Program Alpha',
    technologyAreas: 'Energy',
  },
  {
    awardId: 'AW-003',
    title: 'Sensor Networks',
    amount: 250000,
    awardDate: '2022-06-01',
    startDate: '2022-07-01',
    endDate: '2024-06-30',
    active: 'No',
    people: 'Alice Smith (PI); Bob Jones (Co-PI)',
    organization: 'Tech Institute',
    state: 'Ohio',
    county: 'Cuyahoga',
    programs: 'Program Beta',
    technologyAreas: 'Advanced Materials; Robotics',
  },
  {
    awardId: 'AW-004',
    title: 'Quantum Devices',
    amount: 'TBD',
    awardDate: '2024-02-20',
    active: 'Yes',
    people: 'Carol White',
    organization: 'River College',
    state: 'Texas',
    programs: 'Program Gamma',
    technologyAreas: 'Quantum',
  },
  {
    title: 'Orphan Row',
    amount: 100,
    awardDate: '2024-01-01',
    active: 'No',
    people: 'Ghost Person (PI)',
    organization: 'Phantom Org',
    state: 'Nevada',
    county: 'Clark',
    programs: 'Program Delta',
    technologyAreas: 'Energy',
  },
];
