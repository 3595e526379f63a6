export type JobRole = 'tank' | 'healer' | 'melee' | 'ranged' | 'caster' | 'limited';

type JobInfo = {
  abbrev: string;
  role: JobRole;
};

export const JOBS = {
  Paladin: { abbrev: 'PLD', role: 'tank' },
  Warrior: { abbrev: 'WAR', role: 'tank' },
  DarkKnight: { abbrev: 'DRK', role: 'tank' },
  Gunbreaker: { abbrev: 'GNB', role: 'tank' },
  WhiteMage: { abbrev: 'WHM', role: 'healer' },
  Astrologian: { abbrev: 'AST', role: 'healer' },
  Scholar: { abbrev: 'SCH', role: 'healer' },
  Sage: { abbrev: 'SGE', role: 'healer' },
  Monk: { abbrev: 'MNK', role: 'melee' },
  Dragoon: { abbrev: 'DRG', role: 'melee' },
  Ninja: { abbrev: 'NIN', role: 'melee' },
  Samurai: { abbrev: 'SAM', role: 'melee' },
  Reaper: { abbrev: 'RPR', role: 'melee' },
  Viper: { abbrev: 'VPR', role: 'melee' },
  Bard: { abbrev: 'BRD', role: 'ranged' },
  Machinist: { abbrev: 'MCH', role: 'ranged' },
  Dancer: { abbrev: 'DNC', role: 'ranged' },
  BlackMage: { abbrev: 'BLM', role: 'caster' },
  Summoner: { abbrev: 'SMN', role: 'caster' },
  RedMage: { abbrev: 'RDM', role: 'caster' },
  Pictomancer: { abbrev: 'PCT', role: 'caster' },
  BlueMage: { abbrev: 'BLU', role: 'limited' },
  Beastmaster: { abbrev: 'BSM', role: 'limited' },
} as const satisfies Record<string, JobInfo>;

export type Job = keyof typeof JOBS;

export const isJob = (value: unknown): value is Job =>
  typeof value === 'string' && Object.prototype.hasOwnProperty.call(JOBS, value);

export const jobAbbrev = (job: Job): string => JOBS[job].abbrev;

export const jobRole = (job: Job): JobRole => JOBS[job].role;

export const WAYMARKS = ['A', 'B', 'C', 'D', 'One', 'Two', 'Three', 'Four'] as const;

export type Waymark = (typeof WAYMARKS)[number];

export const isWaymark = (value: unknown): value is Waymark =>
  WAYMARKS.some((mark) => mark === value);
