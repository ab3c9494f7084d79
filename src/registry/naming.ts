/**
 * Name and namespace inference for declared resources.
 */

import { isAbsolute, relative, sep } from 'node:path';
import { fileURLToPath } from 'node:url';
import { DeclarationError } from '../errors.js';

/** Segments that end a namespace when inferred from a module path. */
export const GROUPING_MARKERS: readonly string[] = ['resources', 'default', 'adapter', 'index'];

/** Leading build and source directories that are not part of a namespace. */
const SOURCE_ROOTS: readonly string[] = ['src', 'lib', 'dist'];

/**
 * Convert an identifier to lower snake case.
 *
 * @example
 * snakeCase('GetUserInfo'); // 'get_user_info'
 * snakeCase('HTTPClient');  // 'http_client'
 */
export function snakeCase(identifier: string): string {
  return identifier
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .replace(/([a-z\d])([A-Z])/g, '$1_$2')
    .replace(/-/g, '_')
    .toLowerCase();
}

/**
 * Derive a registered name from a class or function identifier.
 *
 * @example
 * inferResourceName('GetUserInfoResource'); // 'get_user_info'
 * inferResourceName('UserInfoAPI');         // 'user_info_api'
 * inferResourceName('listUsers');           // 'list_users'
 */
export function inferResourceName(identifier: string): string {
  if (!identifier) {
    return 'resource';
  }

  if (identifier.endsWith('Resource') && identifier.length > 'Resource'.length) {
    return snakeCase(identifier.slice(0, -'Resource'.length));
  }

  if (identifier.endsWith('API') && identifier.length > 'API'.length) {
    return `${snakeCase(identifier.slice(0, -'API'.length))}_api`;
  }

  return snakeCase(identifier);
}

export interface InferNamespaceOptions {
  /** Directory the module path is made relative to (default: working directory) */
  root?: string;
}

/**
 * Derive a namespace from the path or URL of a declaring module.
 *
 * The path is made relative to `root`, a leading `src`, `lib` or `dist`
 * segment and the file extension are dropped, and the segments are cut at the
 * first grouping marker.
 *
 * @example
 * inferNamespace('/app/src/billing/resources/invoices.ts', { root: '/app' }); // ['billing']
 * inferNamespace(import.meta.url);
 *
 * @throws DeclarationError when no namespace segment remains
 */
export function inferNamespace(modulePath: string, options: InferNamespaceOptions = {}): string[] {
  const filePath = modulePath.startsWith('file:') ? fileURLToPath(modulePath) : modulePath;
  const root = options.root ?? process.cwd();
  const relativePath = isAbsolute(filePath) ? relative(root, filePath) : filePath;

  const segments = relativePath
    .split(sep === '\\' ? /[\\/]/ : '/')
    .filter((segment) => segment.length > 0 && segment !== '.' && segment !== '..');

  const last = segments.length - 1;
  if (last >= 0) {
    segments[last] = (segments[last] ?? '').replace(/\.[cm]?[jt]sx?$/, '').replace(/\.d$/, '');
  }

  if (segments.length > 0 && SOURCE_ROOTS.includes(segments[0] ?? '')) {
    segments.shift();
  }

  const markerIndex = segments.findIndex((segment) => GROUPING_MARKERS.includes(segment));
  const namespace = (markerIndex >= 0 ? segments.slice(0, markerIndex) : segments).map((segment) =>
    segment.replace(/-/g, '_')
  );

  if (namespace.length === 0) {
    throw new DeclarationError(`Cannot infer a namespace from module '${modulePath}'`);
  }
  return namespace;
}

function splitNamespace(namespace: string | readonly string[]): string[] {
  return typeof namespace === 'string' ? (namespace === '' ? [] : namespace.split('.')) : [...namespace];
}

function isSegment(segment: string): boolean {
  return segment.length > 0 && !segment.includes('.');
}

/**
 * Split a dotted namespace into segments, rejecting empty segments.
 */
export function parseNamespace(namespace: string | readonly string[]): string[] {
  const segments = splitNamespace(namespace);
  if (!segments.every(isSegment)) {
    throw new DeclarationError(`Invalid namespace '${segments.join('.')}': empty or dotted segment`);
  }
  return segments;
}

/**
 * Registry key of a namespace, or null when `parseNamespace` would reject it.
 */
export function namespaceKey(namespace: string | readonly string[]): string | null {
  const segments = splitNamespace(namespace);
  return segments.every(isSegment) ? segments.join('.') : null;
}

/**
 * Join a namespace and a name into a dotted path.
 */
export function dottedPath(namespace: readonly string[], name: string): string {
  return namespace.length > 0 ? `${namespace.join('.')}.${name}` : name;
}
