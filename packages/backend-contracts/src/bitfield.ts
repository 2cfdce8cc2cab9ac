/**
 * @module @pkbridge/backend-contracts/bitfield
 *
 * 64-bit enum sets. Bit `n` stands for enum value `n`.
 */

import {
  filterFromString,
  filterToString,
  groupFromString,
  groupToString,
  roleFromString,
  roleToString,
} from './enums.js';

export type Bitfield = bigint;

export const EMPTY_BITFIELD: Bitfield = 0n;

const WIDTH = 64;

function bit(value: number): Bitfield {
  if (!Number.isInteger(value) || value < 0 || value >= WIDTH) {
    throw new RangeError(`Enum value ${value} does not fit in a ${WIDTH}-bit bitfield`);
  }
  return 1n << BigInt(value);
}

export function bitfieldAdd(field: Bitfield, value: number): Bitfield {
  return field | bit(value);
}

export function bitfieldRemove(field: Bitfield, value: number): Bitfield {
  return field & ~bit(value);
}

export function bitfieldContains(field: Bitfield, value: number): boolean {
  return (field & bit(value)) !== 0n;
}

export function bitfieldContainsAny(field: Bitfield, ...values: number[]): boolean {
  return values.some((value) => bitfieldContains(field, value));
}

export function bitfieldUnion(...fields: Bitfield[]): Bitfield {
  return fields.reduce((acc, field) => acc | field, EMPTY_BITFIELD);
}

export function bitfieldFromEnums(...values: number[]): Bitfield {
  return values.reduce<Bitfield>((acc, value) => bitfieldAdd(acc, value), EMPTY_BITFIELD);
}

/**
 * Set members in ascending order.
 */
export function bitfieldToEnums(field: Bitfield): number[] {
  const values: number[] = [];
  for (let value = 0; value < WIDTH; value++) {
    if (bitfieldContains(field, value)) {
      values.push(value);
    }
  }
  return values;
}

function toText(field: Bitfield, name: (value: number) => string): string {
  return bitfieldToEnums(field).map(name).join(';');
}

function fromText(text: string, parse: (name: string) => number): Bitfield {
  return text
    .split(';')
    .map((name) => name.trim())
    .filter((name) => name.length > 0)
    .map(parse)
    .filter((value) => value !== 0)
    .reduce<Bitfield>((acc, value) => bitfieldAdd(acc, value), EMPTY_BITFIELD);
}

export function roleBitfieldToString(field: Bitfield): string {
  return toText(field, (value) => roleToString(value));
}

/**
 * Unknown names are skipped.
 */
export function roleBitfieldFromString(text: string): Bitfield {
  return fromText(text, (name) => roleFromString(name));
}

export function groupBitfieldToString(field: Bitfield): string {
  return toText(field, (value) => groupToString(value));
}

export function groupBitfieldFromString(text: string): Bitfield {
  return fromText(text, (name) => groupFromString(name));
}

export function filterBitfieldToString(field: Bitfield): string {
  return toText(field, (value) => filterToString(value));
}

export function filterBitfieldFromString(text: string): Bitfield {
  return fromText(text, (name) => filterFromString(name));
}
