/**
 * Criteria loader
 *
 * Turns one of the four input selectors into criteria sources:
 *   --query    one raw unit, source "query"
 *   --deffile  one source per file, labelled with the file's base name
 *   --defdir   every definition document under the directory
 *   --iocfile  one raw unit per indicator line, source "ioc"
 */

import { promises as fs } from 'fs';
import { basename, extname } from 'path';
import {
  IOC_SOURCE,
  QUERY_SOURCE,
  type CriteriaSource,
  type SurveyUnit,
} from '../types/index.js';
import { ArgumentError } from '../utils/errors.js';
import { fileExists, listFilesRecursive } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { DEFINITION_EXTENSIONS, parseDefinitions } from './definitions.js';

export type CriteriaSelector =
  | { mode: 'query'; query: string }
  | { mode: 'deffile'; path: string }
  | { mode: 'defdir'; path: string }
  | { mode: 'iocfile'; path: string; iocType: string };

/**
 * Source label for a definition file: base name without extension
 */
export function sourceLabel(filePath: string): string {
  const name = basename(filePath);
  return name.slice(0, name.length - extname(name).length);
}

export function loadQuery(query: string): CriteriaSource {
  return {
    label: QUERY_SOURCE,
    units: [{ kind: 'raw', name: query, source: QUERY_SOURCE, query }],
  };
}

export async function loadDefinitionFile(filePath: string): Promise<CriteriaSource> {
  const label = sourceLabel(filePath);
  const content = await fs.readFile(filePath, 'utf-8');
  const { programs, warnings } = parseDefinitions(content, filePath);

  for (const warning of warnings) {
    logger.warn(`${filePath}: ${warning}`, 'criteria');
  }

  const units = Object.entries(programs).map(([name, criteria]): SurveyUnit => ({
    kind: 'criteria',
    name,
    source: label,
    criteria,
  }));

  return { label, path: filePath, units };
}

export async function loadDefinitionDir(dir: string): Promise<CriteriaSource[]> {
  const files = await listFilesRecursive(dir, DEFINITION_EXTENSIONS);
  if (files.length === 0) {
    logger.warn(`No definition files (${DEFINITION_EXTENSIONS.join(', ')}) under ${dir}`, 'criteria');
  }

  const sources: CriteriaSource[] = [];
  for (const file of files) {
    sources.push(await loadDefinitionFile(file));
  }
  return sources;
}

/**
 * Each non-empty trimmed line is one indicator, searched as <iocType>:<ioc>
 */
export async function loadIocFile(filePath: string, iocType: string): Promise<CriteriaSource> {
  const content = await fs.readFile(filePath, 'utf-8');
  const units = content
    .split('\n')
    .map(line => line.trim())
    .filter(Boolean)
    .map((ioc): SurveyUnit => ({
      kind: 'raw',
      name: ioc,
      source: IOC_SOURCE,
      query: `${iocType}:${ioc}`,
    }));

  return { label: IOC_SOURCE, path: filePath, units };
}

/**
 * Load every criteria source for the selector.
 * A missing file or directory is an ArgumentError.
 */
export async function loadCriteria(selector: CriteriaSelector): Promise<CriteriaSource[]> {
  if (selector.mode === 'query') {
    return [loadQuery(selector.query)];
  }

  if (!(await fileExists(selector.path))) {
    throw new ArgumentError(`${selector.mode} does not exist: ${selector.path}`);
  }

  switch (selector.mode) {
    case 'deffile':
      return [await loadDefinitionFile(selector.path)];
    case 'defdir':
      return loadDefinitionDir(selector.path);
    case 'iocfile':
      return [await loadIocFile(selector.path, selector.iocType)];
  }
}
