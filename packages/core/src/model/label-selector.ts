/**
 * Label selector parsing
 *
 * Supports the string form accepted by `kubectl -l`:
 *   app=backend, tier!=cache, env in (prod,staging), !legacy, release
 */

import { ConfigurationError } from '@seqctl/shared';
import type { LabelRequirement } from './types.js';

const NAME_PATTERN = /^[A-Za-z0-9]([-A-Za-z0-9_.]*[A-Za-z0-9])?$/;
const DNS_SUBDOMAIN_PATTERN = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?(\.[a-z0-9]([-a-z0-9]*[a-z0-9])?)*$/;
const SET_PATTERN = /^(\S+)\s+(in|notin)\s*\((.*)\)$/;

function fail(selector: string, reason: string): never {
  throw new ConfigurationError(`Invalid label selector "${selector}": ${reason}`, { selector });
}

function isValidKey(key: string): boolean {
  const slash = key.indexOf('/');
  if (slash === -1) {
    return key.length <= 63 && NAME_PATTERN.test(key);
  }
  const prefix = key.slice(0, slash);
  const name = key.slice(slash + 1);
  return (
    prefix.length > 0 &&
    prefix.length <= 253 &&
    DNS_SUBDOMAIN_PATTERN.test(prefix) &&
    name.length <= 63 &&
    NAME_PATTERN.test(name)
  );
}

function isValidValue(value: string): boolean {
  return value === '' || (value.length <= 63 && NAME_PATTERN.test(value));
}

/** Split on commas that are not inside a parenthesised value set */
function splitTerms(selector: string): string[] {
  const terms: string[] = [];
  let depth = 0;
  let current = '';

  for (const char of selector) {
    if (char === '(') depth++;
    if (char === ')') depth--;
    if (depth < 0) {
      fail(selector, 'unbalanced parentheses');
    }
    if (char === ',' && depth === 0) {
      terms.push(current.trim());
      current = '';
      continue;
    }
    current += char;
  }

  if (depth !== 0) {
    fail(selector, 'unbalanced parentheses');
  }
  terms.push(current.trim());
  return terms;
}

function parseTerm(selector: string, term: string): LabelRequirement {
  if (term === '') {
    fail(selector, 'empty requirement');
  }

  const set = SET_PATTERN.exec(term);
  if (set) {
    const [, key = '', op, rawValues = ''] = set;
    const values = rawValues.split(',').map((v) => v.trim());
    if (values.length === 0 || values.some((v) => v === '')) {
      fail(selector, `empty value in set for "${key}"`);
    }
    return { key, operator: op === 'in' ? 'In' : 'NotIn', values };
  }

  if (term.startsWith('!')) {
    return { key: term.slice(1).trim(), operator: 'DoesNotExist', values: [] };
  }

  for (const [token, operator] of [
    ['!=', 'NotEquals'],
    ['==', 'Equals'],
    ['=', 'Equals'],
  ] as const) {
    const at = term.indexOf(token);
    if (at !== -1) {
      return {
        key: term.slice(0, at).trim(),
        operator,
        values: [term.slice(at + token.length).trim()],
      };
    }
  }

  return { key: term, operator: 'Exists', values: [] };
}

/**
 * Parse a selector into requirements. An empty selector is rejected: as a
 * readiness target it would match every pod in the namespace.
 */
export function parseLabelSelector(selector: string): LabelRequirement[] {
  if (selector.trim() === '') {
    fail(selector, 'selector must not be empty');
  }

  return splitTerms(selector).map((term) => {
    const requirement = parseTerm(selector, term);
    if (!isValidKey(requirement.key)) {
      fail(selector, `invalid label key "${requirement.key}"`);
    }
    const badValue = requirement.values.find((v) => !isValidValue(v));
    if (badValue !== undefined) {
      fail(selector, `invalid label value "${badValue}"`);
    }
    return requirement;
  });
}

export function matchesLabels(requirements: readonly LabelRequirement[], labels: Readonly<Record<string, string>>): boolean {
  return requirements.every(({ key, operator, values }) => {
    const value = labels[key];
    switch (operator) {
      case 'Exists':
        return value !== undefined;
      case 'DoesNotExist':
        return value === undefined;
      case 'Equals':
      case 'In':
        return value !== undefined && values.includes(value);
      case 'NotEquals':
      case 'NotIn':
        return value === undefined || !values.includes(value);
    }
  });
}
