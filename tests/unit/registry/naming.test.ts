/**
 * Name and namespace inference tests.
 */

import { describe, expect, it } from 'vitest';
import { DeclarationError } from '../../../src/errors.js';
import {
  dottedPath,
  inferNamespace,
  inferResourceName,
  namespaceKey,
  parseNamespace,
  snakeCase,
} from '../../../src/registry/naming.js';

describe('snakeCase', () => {
  it('splits camel and pascal case', () => {
    expect(snakeCase('GetUserInfo')).toBe('get_user_info');
    expect(snakeCase('listUsers')).toBe('list_users');
  });

  it('keeps acronyms together', () => {
    expect(snakeCase('HTTPClient')).toBe('http_client');
  });

  it('turns dashes into underscores', () => {
    expect(snakeCase('user-profile')).toBe('user_profile');
  });
});

describe('inferResourceName', () => {
  it('drops a Resource suffix', () => {
    expect(inferResourceName('GetUserInfoResource')).toBe('get_user_info');
  });

  it('keeps an API suffix as _api', () => {
    expect(inferResourceName('UserInfoAPI')).toBe('user_info_api');
  });

  it('snake-cases function names', () => {
    expect(inferResourceName('listUsers')).toBe('list_users');
  });

  it('does not strip a bare suffix', () => {
    expect(inferResourceName('Resource')).toBe('resource');
  });

  it('names anonymous implementations', () => {
    expect(inferResourceName('')).toBe('resource');
  });
});

describe('inferNamespace', () => {
  it('cuts at a grouping marker', () => {
    expect(inferNamespace('/app/src/billing/resources/invoices.ts', { root: '/app' })).toEqual(['billing']);
  });

  it('accepts file URLs', () => {
    expect(inferNamespace('file:///app/src/apps/user-profile/queries.ts', { root: '/app' })).toEqual([
      'apps',
      'user_profile',
      'queries',
    ]);
  });

  it('drops a leading build directory of relative paths', () => {
    expect(inferNamespace('lib/reports/default.js')).toEqual(['reports']);
  });

  it('rejects modules that leave no namespace', () => {
    expect(() => inferNamespace('/app/src/index.ts', { root: '/app' })).toThrow(DeclarationError);
  });
});

describe('parseNamespace', () => {
  it('splits dotted strings', () => {
    expect(parseNamespace('apps.billing')).toEqual(['apps', 'billing']);
  });

  it('treats the empty string as the root namespace', () => {
    expect(parseNamespace('')).toEqual([]);
  });

  it('rejects empty segments', () => {
    expect(() => parseNamespace('apps..billing')).toThrow(DeclarationError);
  });

  it('rejects dotted array segments', () => {
    expect(() => parseNamespace(['apps.billing'])).toThrow(DeclarationError);
  });
});

describe('namespaceKey', () => {
  it('joins valid namespaces', () => {
    expect(namespaceKey(['apps', 'billing'])).toBe('apps.billing');
    expect(namespaceKey('apps.billing')).toBe('apps.billing');
    expect(namespaceKey('')).toBe('');
  });

  it('returns null where parseNamespace throws', () => {
    expect(namespaceKey(['apps.billing'])).toBeNull();
    expect(namespaceKey('apps..billing')).toBeNull();
  });
});

describe('dottedPath', () => {
  it('joins namespace and name', () => {
    expect(dottedPath(['apps', 'billing'], 'get_invoice')).toBe('apps.billing.get_invoice');
  });

  it('returns the bare name at the root', () => {
    expect(dottedPath([], 'ping')).toBe('ping');
  });
});
