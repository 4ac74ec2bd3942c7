import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import {
  collectModules,
  parseComponentTag,
  resolveComponentsByTags
} from '../../../src/core/components/component-selector.js';
import { createCollectingDiagnostics } from '../../../src/core/ports/diagnostics.js';
import type { DependencyMapping } from '../../../src/types/distribution.js';
import { WarningCodes } from '../../../src/types/index.js';

const mapping: DependencyMapping = {
  'lambdacomponents.connector.spaneventtolog': ['example.com/spaneventtolog'],
  'lambdacomponents.exporter.clickhouse': ['example.com/clickhouse', 'example.com/shared'],
  'lambdacomponents.exporter.awss3': ['example.com/awss3', 'example.com/shared'],
  'lambdacomponents.extension.asmauth': [],
  'otherdomain.exporter.thing': ['example.com/thing']
};

describe('parseComponentTag', () => {
  it('splits a three-part tag', () => {
    assert.deepEqual(parseComponentTag('lambdacomponents.exporter.clickhouse'), {
      tag: 'lambdacomponents.exporter.clickhouse',
      domain: 'lambdacomponents',
      category: 'exporter',
      name: 'clickhouse',
      prefix: 'lambdacomponents.exporter'
    });
  });

  it('keeps extra segments in the name', () => {
    assert.equal(parseComponentTag('a.b.c.d')?.name, 'c.d');
  });

  it('rejects short or empty-segment tags', () => {
    assert.equal(parseComponentTag('lambdacomponents.all'), null);
    assert.equal(parseComponentTag('lambdacomponents..x'), null);
  });
});

describe('resolveComponentsByTags', () => {
  it('returns nothing when no tags are active', () => {
    assert.deepEqual(resolveComponentsByTags([], mapping), []);
  });

  it('includes direct matches only', () => {
    assert.deepEqual(
      resolveComponentsByTags(['lambdacomponents.custom', 'lambdacomponents.exporter.clickhouse'], mapping),
      ['lambdacomponents.exporter.clickhouse']
    );
  });

  it('includes every component of a category for a category wildcard', () => {
    assert.deepEqual(
      resolveComponentsByTags(['lambdacomponents.exporter.all'], mapping),
      ['lambdacomponents.exporter.clickhouse', 'lambdacomponents.exporter.awss3']
    );
  });

  it('includes every mapped component for the global wildcard', () => {
    assert.deepEqual(resolveComponentsByTags(['lambdacomponents.all'], mapping), [
      'lambdacomponents.connector.spaneventtolog',
      'lambdacomponents.exporter.clickhouse',
      'lambdacomponents.exporter.awss3',
      'lambdacomponents.extension.asmauth',
      'otherdomain.exporter.thing'
    ]);
  });

  it('limits another domain\'s wildcard to that domain', () => {
    assert.deepEqual(resolveComponentsByTags(['otherdomain.all'], mapping), ['otherdomain.exporter.thing']);
  });

  it('follows mapping key order and lists each component once', () => {
    assert.deepEqual(
      resolveComponentsByTags(
        ['lambdacomponents.exporter.awss3', 'lambdacomponents.exporter.all', 'lambdacomponents.connector.spaneventtolog'],
        mapping
      ),
      [
        'lambdacomponents.connector.spaneventtolog',
        'lambdacomponents.exporter.clickhouse',
        'lambdacomponents.exporter.awss3'
      ]
    );
  });

  it('does not let a category wildcard pull in a component literally named all', () => {
    const withAllKey: DependencyMapping = {
      'lambdacomponents.exporter.all': ['example.com/everything'],
      'lambdacomponents.exporter.clickhouse': []
    };
    assert.deepEqual(resolveComponentsByTags(['lambdacomponents.exporter.all'], withAllKey), [
      'lambdacomponents.exporter.all',
      'lambdacomponents.exporter.clickhouse'
    ]);
    assert.deepEqual(resolveComponentsByTags(['lambdacomponents.receiver.all'], withAllKey), []);
  });

  it('skips and reports keys that are not three-part tags', () => {
    const diagnostics = createCollectingDiagnostics();
    const result = resolveComponentsByTags(
      ['lambdacomponents.all'],
      { 'lambdacomponents.bad': ['example.com/bad'], 'lambdacomponents.exporter.clickhouse': [] },
      diagnostics
    );
    assert.deepEqual(result, ['lambdacomponents.exporter.clickhouse']);
    assert.deepEqual(diagnostics.warnings, [
      {
        code: WarningCodes.UNKNOWN_COMPONENT_TAG_FORMAT,
        message: 'Invalid component tag format: lambdacomponents.bad',
        details: { tag: 'lambdacomponents.bad' }
      }
    ]);
  });

  it('accepts any iterable of tags', () => {
    assert.deepEqual(
      resolveComponentsByTags(new Set(['lambdacomponents.extension.asmauth']), mapping),
      ['lambdacomponents.extension.asmauth']
    );
  });
});

describe('collectModules', () => {
  it('returns the sorted union of required modules', () => {
    assert.deepEqual(
      collectModules(['lambdacomponents.exporter.awss3', 'lambdacomponents.exporter.clickhouse', 'lambdacomponents.extension.asmauth'], mapping),
      ['example.com/awss3', 'example.com/clickhouse', 'example.com/shared']
    );
  });

  it('ignores components missing from the mapping', () => {
    assert.deepEqual(collectModules(['lambdacomponents.receiver.unknown'], mapping), []);
  });
});
