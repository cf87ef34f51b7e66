/**
 * Acceptance Engine
 * Threshold-based accept/reject verdict for a scored record, and the comparison used to
 * keep the better of two records produced by different strategies.
 */

import { ComponentFilter } from '../types/googleMaps';
import { AddressRecord, ThresholdName, Thresholds } from '../types/place';
import { ConfigurationError } from '../utils/errors';

export const DEFAULT_THRESHOLDS: Readonly<Thresholds> = {
  threshold: 0.85,
  thresholdOnName: 0,
  thresholdOnAddr: 0,
  thresholdOnCity: 0.9,
  thresholdOnPostalCode: 1
};

const THRESHOLD_ALIASES: Readonly<Record<string, ThresholdName>> = {
  threshold: 'threshold',
  thresholdOnName: 'thresholdOnName',
  threshold_on_name: 'thresholdOnName',
  thresholdOnAddr: 'thresholdOnAddr',
  threshold_on_addr: 'thresholdOnAddr',
  thresholdOnCity: 'thresholdOnCity',
  threshold_on_city: 'thresholdOnCity',
  thresholdOnPostalCode: 'thresholdOnPostalCode',
  threshold_on_postal_code: 'thresholdOnPostalCode'
};

/** Record fields each Geocoding API component filter is checked against. */
const COMPONENT_FIELDS: Readonly<Record<string, ReadonlyArray<keyof AddressRecord>>> = {
  country: ['country', 'countryCode'],
  postal_code: ['postalCode'],
  locality: ['city'],
  administrative_area: ['adminAreaLevel1', 'adminAreaLevel2'],
  route: ['street']
};

export const SUPPORTED_COMPONENTS = Object.keys(COMPONENT_FIELDS);

export type ThresholdInput = Readonly<Record<string, unknown>>;

/**
 * Returns a copy of `base` with the given thresholds applied. Keys may be camelCase or
 * snake_case; an unknown key or an out-of-range value throws a ConfigurationError.
 */
export function resolveThresholds(input: ThresholdInput, base: Readonly<Thresholds> = DEFAULT_THRESHOLDS): Thresholds {
  const thresholds: Thresholds = { ...base };

  for (const [key, value] of Object.entries(input)) {
    const name = THRESHOLD_ALIASES[key];
    if (name === undefined) {
      throw new ConfigurationError(`Unknown threshold: ${key}`, key);
    }
    if (typeof value !== 'number' || !Number.isFinite(value) || value < 0 || value > 1) {
      throw new ConfigurationError(`Threshold ${key} must be a number between 0 and 1`, key);
    }
    if (name === 'thresholdOnPostalCode' && value !== 0 && value !== 1) {
      throw new ConfigurationError(`Threshold ${key} must be 0 or 1`, key);
    }
    thresholds[name] = value;
  }

  return thresholds;
}

export function validateComponents(components: ComponentFilter | null): void {
  if (components === null) {
    return;
  }

  for (const key of Object.keys(components)) {
    if (COMPONENT_FIELDS[key] === undefined) {
      throw new ConfigurationError(`Unsupported component filter: ${key}`, key);
    }
  }
}

function satisfiesComponents(record: AddressRecord, components: ComponentFilter | null): boolean {
  if (components === null) {
    return true;
  }

  return Object.entries(components).every(([key, expected]) => {
    const fields = COMPONENT_FIELDS[key] ?? [];
    return fields.some((field) => String(record[field]).toLowerCase() === String(expected).toLowerCase());
  });
}

export interface AcceptanceContext {
  thresholds: Thresholds;
  components: ComponentFilter | null;
  inputPostalCode?: string;
}

/**
 * Verdict for a scored record:
 * 1. every component filter must match;
 * 2. the postal code OR the city must pass its threshold;
 * 3. the address, then the overall confidence, must pass theirs;
 * 4. NOT_FOUND and APPROXIMATE locations are always rejected.
 *
 * The postal code gate only rejects when both codes are known and either their departments
 * (first two characters) differ or the postal code score is under the threshold.
 */
export function check(record: AddressRecord, context: AcceptanceContext): boolean {
  const { thresholds } = context;

  if (!satisfiesComponents(record, context.components)) {
    return false;
  }

  let postalCodeAdmits = true;
  if (thresholds.thresholdOnPostalCode > 0) {
    const input = String(context.inputPostalCode ?? '');
    const parsed = record.postalCode;

    if (input.length > 0 && parsed.length > 0) {
      if (input.slice(0, 2) !== parsed.slice(0, 2)) {
        postalCodeAdmits = false;
      } else if (record.confidenceOnPostalCode < thresholds.thresholdOnPostalCode) {
        postalCodeAdmits = false;
      }
    }
  }

  let cityAdmits = true;
  if (thresholds.thresholdOnCity > 0 && record.confidenceOnCity < thresholds.thresholdOnCity) {
    cityAdmits = false;
  }

  if (!postalCodeAdmits && !cityAdmits) {
    return false;
  }

  if (thresholds.thresholdOnAddr > 0 && record.confidenceOnAddr < thresholds.thresholdOnAddr) {
    return false;
  }

  if (thresholds.threshold > 0 && record.confidence < thresholds.threshold) {
    return false;
  }

  return record.locationAccuracy > 1;
}

/**
 * Whether `candidate` should replace `other`, judged with the candidate's thresholds.
 *
 * The rule checks are skipped when the candidate is accepted and `other` is not. Whatever
 * they decide, a candidate only wins when its postal code or city score is strictly higher.
 */
export function isBetter(
  candidate: AddressRecord,
  other: AddressRecord | null | undefined,
  thresholds: Thresholds
): boolean {
  if (other === null || other === undefined) {
    return true;
  }

  let better = true;

  if (!(candidate.accepted && !other.accepted)) {
    if (thresholds.thresholdOnPostalCode > 0 && candidate.confidenceOnPostalCode < other.confidenceOnPostalCode) {
      better = false;
    }

    if (thresholds.thresholdOnCity > 0 && candidate.confidenceOnCity < other.confidenceOnCity) {
      better = false;
    }

    if (candidate.locationAccuracy < other.locationAccuracy) {
      better = false;
    }

    if (candidate.locationAccuracy > 1) {
      if (thresholds.thresholdOnAddr > 0 && candidate.confidenceOnAddr < other.confidenceOnAddr) {
        better = false;
      }

      if (thresholds.thresholdOnName > 0 && candidate.confidenceOnName < other.confidenceOnName) {
        better = false;
      }

      if (
        thresholds.threshold > 0
        && candidate.confidence > other.confidence
        && candidate.locationAccuracy <= other.locationAccuracy
      ) {
        better = false;
      }
    }
  }

  if (better) {
    better = candidate.confidenceOnPostalCode > other.confidenceOnPostalCode
      || candidate.confidenceOnCity > other.confidenceOnCity;
  }

  return better;
}
