/**
 * Definition documents
 *
 * A definition document maps program name → search field → terms:
 *
 *   { "chrome": { "process_name": ["chrome.exe"] } }
 *
 * JSON and YAML documents share the same shape.
 */

import { extname } from 'path';
import { parse as parseYaml } from 'yaml';
import type { ProgramDefinitions, SearchCriteria } from '../types/index.js';

/** Extensions recognised as definition documents */
export const DEFINITION_EXTENSIONS = ['.json', '.yaml', '.yml'] as const;

export interface DefinitionIssue {
  path: string;
  message: string;
}

export class DefinitionError extends Error {
  constructor(
    message: string,
    public readonly file: string,
    public readonly issues: DefinitionIssue[] = []
  ) {
    super(message);
    this.name = 'DefinitionError';
  }
}

export interface ParsedDefinitions {
  programs: ProgramDefinitions;
  /** Programs or fields dropped because they had nothing to search for */
  warnings: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isYamlPath(filePath: string): boolean {
  const ext = extname(filePath).toLowerCase();
  return ext === '.yaml' || ext === '.yml';
}

function decode(content: string, file: string): unknown {
  try {
    return isYamlPath(file) ? parseYaml(content) : JSON.parse(content);
  } catch (err) {
    const format = isYamlPath(file) ? 'YAML' : 'JSON';
    throw new DefinitionError(
      `Invalid ${format} in ${file}: ${err instanceof Error ? err.message : String(err)}`,
      file
    );
  }
}

function readTerms(value: unknown, path: string, issues: DefinitionIssue[]): string[] | null {
  // A bare string is a one-term list
  if (typeof value === 'string') {
    return [value];
  }
  if (!Array.isArray(value)) {
    issues.push({ path, message: 'terms must be an array of strings' });
    return null;
  }

  const terms: string[] = [];
  value.forEach((term: unknown, i) => {
    if (typeof term === 'string') {
      terms.push(term);
    } else if (typeof term === 'number') {
      terms.push(String(term));
    } else {
      issues.push({ path: `${path}[${i}]`, message: 'each term must be a string' });
    }
  });
  return terms;
}

/**
 * Validate a decoded document and turn it into program definitions
 */
export function validateDefinitions(raw: unknown, file: string): ParsedDefinitions {
  if (!isRecord(raw)) {
    throw new DefinitionError(`Invalid definition file ${file}: top level must be an object`, file, [
      { path: '', message: 'top level must be an object' },
    ]);
  }

  const issues: DefinitionIssue[] = [];
  const warnings: string[] = [];
  // Entries, not assignment: a "__proto__" key must stay an ordinary key
  const programs: [string, SearchCriteria][] = [];

  for (const [program, fields] of Object.entries(raw)) {
    if (!isRecord(fields)) {
      issues.push({ path: program, message: 'program must map search fields to terms' });
      continue;
    }

    const criteria: [string, readonly string[]][] = [];
    for (const [field, value] of Object.entries(fields)) {
      const terms = readTerms(value, `${program}.${field}`, issues);
      if (terms === null) continue;
      if (terms.length === 0) {
        warnings.push(`${program}.${field} has no terms, skipped`);
        continue;
      }
      criteria.push([field, Object.freeze(terms)]);
    }

    if (criteria.length === 0) {
      warnings.push(`${program} has no search fields, skipped`);
      continue;
    }
    programs.push([program, Object.freeze(Object.fromEntries(criteria))]);
  }

  if (issues.length > 0) {
    throw new DefinitionError(
      `Invalid definition file ${file}: ${issues.map(i => `${i.path}: ${i.message}`).join(', ')}`,
      file,
      issues
    );
  }

  return { programs: Object.freeze(Object.fromEntries(programs)), warnings };
}

/**
 * Parse definition document text; the format follows the file extension
 */
export function parseDefinitions(content: string, file: string): ParsedDefinitions {
  return validateDefinitions(decode(content, file), file);
}
