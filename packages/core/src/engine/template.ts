// packages/core/src/engine/template.ts — `${name}` substitution

import { InvalidTemplateError } from '../utils/errors.js';
import type { VariableLookup } from './condition.js';

const NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** True when `name` can appear inside `${...}` and as a step `output`. */
export function isVariableName(name: string): boolean {
  return NAME_PATTERN.test(name);
}

export const TEMPLATE_FILTERS = ['upper', 'lower', 'trim', 'length', 'count', 'first', 'last', 'json'] as const;

export type TemplateFilter = (typeof TEMPLATE_FILTERS)[number];

function isTemplateFilter(name: string): name is TemplateFilter {
  return TEMPLATE_FILTERS.some((filter) => filter === name);
}

/** Captured output that holds a JSON array, or undefined. */
function asArray(value: string): unknown[] | undefined {
  const text = value.trim();
  if (!text.startsWith('[')) return undefined;
  try {
    const parsed: unknown = JSON.parse(text);
    return Array.isArray(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

function itemText(item: unknown): string {
  return typeof item === 'string' ? item : JSON.stringify(item);
}

function applyFilter(filter: TemplateFilter, value: string): string {
  switch (filter) {
    case 'upper':
      return value.toUpperCase();
    case 'lower':
      return value.toLowerCase();
    case 'trim':
      return value.trim();
    case 'length':
    case 'count':
      return String(asArray(value)?.length ?? [...value].length);
    case 'first': {
      const items = asArray(value);
      if (items) return items.length > 0 ? itemText(items[0]) : '';
      return [...value][0] ?? '';
    }
    case 'last': {
      const items = asArray(value);
      if (items) return items.length > 0 ? itemText(items[items.length - 1]) : '';
      return [...value].at(-1) ?? '';
    }
    case 'json':
      try {
        return JSON.stringify(JSON.parse(value), null, 2);
      } catch {
        // Not JSON: pass the text through
        return value;
      }
  }
}

/** Apply filters left to right. Arrays are recognised from JSON text. */
export function applyFilters(value: string, filters: readonly TemplateFilter[]): string {
  return filters.reduce((current, filter) => applyFilter(filter, current), value);
}

export interface VariableReference {
  name: string;
  filters: TemplateFilter[];
}

/** Parse the inside of `${...}`: a name, then any number of `| filter` clauses. */
export function parseReference(body: string): VariableReference | { error: string } {
  const [head, ...rest] = body.split('|').map((part) => part.trim());
  if (!isVariableName(head)) {
    return { error: `bad variable name '${head}'` };
  }
  const filters: TemplateFilter[] = [];
  for (const filter of rest) {
    if (!isTemplateFilter(filter)) {
      return { error: `unknown filter '${filter}'` };
    }
    filters.push(filter);
  }
  return { name: head, filters };
}

type Segment = { type: 'text'; value: string } | { type: 'var'; ref: VariableReference };

/**
 * Split a template into literal text and variable references.
 * A `$` not followed by `{` is literal, so `$HOME` and `$1` reach the shell untouched.
 */
function scan(template: string): Segment[] {
  const segments: Segment[] = [];
  let text = '';
  let i = 0;

  while (i < template.length) {
    if (template[i] === '$' && template[i + 1] === '{') {
      const close = template.indexOf('}', i + 2);
      if (close === -1) {
        throw new InvalidTemplateError(template, `unterminated placeholder at ${i}`);
      }
      const ref = parseReference(template.slice(i + 2, close));
      if ('error' in ref) {
        throw new InvalidTemplateError(template, `${ref.error} at ${i}`);
      }
      if (text) segments.push({ type: 'text', value: text });
      text = '';
      segments.push({ type: 'var', ref });
      i = close + 1;
      continue;
    }
    text += template[i];
    i++;
  }

  if (text) segments.push({ type: 'text', value: text });
  return segments;
}

/**
 * Replace every `${name}` and `${name | filter}` in one pass. Substituted values are never re-scanned,
 * so a value containing `${...}` is inserted verbatim.
 */
export function renderTemplate(template: string, lookup: VariableLookup): string {
  return scan(template)
    .map((segment) =>
      segment.type === 'text' ? segment.value : applyFilters(lookup(segment.ref.name), segment.ref.filters),
    )
    .join('');
}

/** Variable names referenced by a template, in order of first appearance. */
export function templateVariables(template: string): string[] {
  const names: string[] = [];
  for (const segment of scan(template)) {
    if (segment.type === 'var' && !names.includes(segment.ref.name)) {
      names.push(segment.ref.name);
    }
  }
  return names;
}

export function isValidTemplate(template: string): boolean {
  try {
    scan(template);
    return true;
  } catch {
    return false;
  }
}
