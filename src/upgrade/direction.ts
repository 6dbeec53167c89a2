/**
 * Grammatical forms of an upgrade direction, used in display text
 */

import type { Direction } from './types.js';

interface DirectionForms {
  text: string;
  past: string;
  plural: string;
  verb: string;
  preposition: string;
}

const FORMS: Record<Direction, DirectionForms> = {
  UPGRADE: {
    text: 'upgrade',
    past: 'upgraded',
    plural: 'upgrades',
    verb: 'upgrading',
    preposition: 'to',
  },
  DOWNGRADE: {
    text: 'downgrade',
    past: 'downgraded',
    plural: 'downgrades',
    verb: 'downgrading',
    preposition: 'from',
  },
};

function proper(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

export function isDowngrade(direction: Direction): boolean {
  return direction === 'DOWNGRADE';
}

/** `upgrade` / `Upgrade` */
export function getDirectionText(direction: Direction, properCase = false): string {
  const value = FORMS[direction].text;
  return properCase ? proper(value) : value;
}

/** `upgraded` / `Upgraded` */
export function getDirectionPast(direction: Direction, properCase = false): string {
  const value = FORMS[direction].past;
  return properCase ? proper(value) : value;
}

/** `upgrades` / `Upgrades` */
export function getDirectionPlural(direction: Direction, properCase = false): string {
  const value = FORMS[direction].plural;
  return properCase ? proper(value) : value;
}

/** `upgrading` / `Upgrading` */
export function getDirectionVerb(direction: Direction, properCase = false): string {
  const value = FORMS[direction].verb;
  return properCase ? proper(value) : value;
}

/** `to` for upgrades, `from` for downgrades */
export function getDirectionPreposition(direction: Direction): string {
  return FORMS[direction].preposition;
}
