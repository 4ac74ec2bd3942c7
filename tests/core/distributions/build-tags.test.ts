import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import {
  describeDistribution,
  formatBuildTagsString,
  getDistributionChoices,
  parseBuildTagsString,
  resolveBuildTags
} from '../../../src/core/distributions/build-tags.js';
import { parseDistributionsYaml } from '../../../src/core/distributions/distribution-loader.js';
import type { DistributionTable } from '../../../src/types/distribution.js';
import { ErrorCodes } from '../../../src/types/index.js';
import {
  CircularDistributionError,
  DistributionError,
  DistributionNotFoundError
} from '../../../src/utils/errors.js';

const table: DistributionTable = {
  base: { name: 'base', buildtags: ['b', 'a'] },
  child: { name: 'child', base: 'base', buildtags: ['c', 'a'] },
  grandchild: { name: 'grandchild', base: 'child', buildtags: ['d'], description: 'Three levels', configFile: 'gc.yaml' },
  empty: { name: 'empty', buildtags: [] },
  orphan: { name: 'orphan', base: 'nowhere', buildtags: ['x'] },
  loopA: { name: 'loopA', base: 'loopB', buildtags: ['la'] },
  loopB: { name: 'loopB', base: 'loopA', buildtags: ['lb'] },
  self: { name: 'self', base: 'self', buildtags: [] }
};

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  assert.fail('expected an error');
}

describe('resolveBuildTags', () => {
  it('returns own tags sorted and deduplicated', () => {
    assert.deepEqual(resolveBuildTags('base', table), ['a', 'b']);
  });

  it('merges the base chain', () => {
    assert.deepEqual(resolveBuildTags('child', table), ['a', 'b', 'c']);
    assert.deepEqual(resolveBuildTags('grandchild', table), ['a', 'b', 'c', 'd']);
  });

  it('returns an empty list for a distribution with no tags', () => {
    assert.deepEqual(resolveBuildTags('empty', table), []);
  });

  it('does not mutate the table', () => {
    resolveBuildTags('grandchild', table);
    assert.deepEqual(table.child.buildtags, ['c', 'a']);
  });

  it('reports an unknown distribution', () => {
    const error = catchError(() => resolveBuildTags('missing', table));
    assert.ok(error instanceof DistributionNotFoundError);
    assert.equal(error.code, ErrorCodes.DISTRIBUTION_NOT_FOUND);
    assert.equal(error.message, "Distribution 'missing' not found in configuration.");
  });

  it('names the failing base for a dangling reference', () => {
    const error = catchError(() => resolveBuildTags('orphan', table));
    assert.ok(error instanceof DistributionError);
    assert.equal(error.code, ErrorCodes.DISTRIBUTION_NOT_FOUND);
    assert.equal(
      error.message,
      "Error resolving base 'nowhere' for distribution 'orphan': Distribution 'nowhere' not found in configuration."
    );
    assert.ok(error.cause instanceof DistributionNotFoundError);
  });

  it('reports a base that names a bare entry as not found', () => {
    const parsed = parseDistributionsYaml('ghost:\nchild:\n  base: ghost\n  buildtags: [x]\n', 'distributions.yaml');
    const error = catchError(() => resolveBuildTags('child', parsed));
    assert.ok(error instanceof DistributionError);
    assert.equal(error.code, ErrorCodes.DISTRIBUTION_NOT_FOUND);
    assert.equal(
      error.message,
      "Error resolving base 'ghost' for distribution 'child': Distribution 'ghost' not found in configuration."
    );
    assert.ok(error.cause instanceof DistributionNotFoundError);
  });

  it('detects a two-node cycle and keeps the cycle code through wrapping', () => {
    const error = catchError(() => resolveBuildTags('loopA', table));
    assert.ok(error instanceof DistributionError);
    assert.equal(error.code, ErrorCodes.CIRCULAR_DEPENDENCY);
    assert.equal(
      error.message,
      "Error resolving base 'loopB' for distribution 'loopA': " +
        "Error resolving base 'loopA' for distribution 'loopB': " +
        'Circular dependency detected involving distribution: loopA'
    );
  });

  it('detects a self reference', () => {
    const error = catchError(() => resolveBuildTags('self', table));
    assert.ok(error instanceof DistributionError);
    assert.equal(error.code, ErrorCodes.CIRCULAR_DEPENDENCY);
    assert.ok(error.cause instanceof CircularDistributionError);
  });

  it('allows two branches to share a base', () => {
    const diamond: DistributionTable = {
      root: { name: 'root', buildtags: ['r'] },
      left: { name: 'left', base: 'root', buildtags: ['l'] },
      right: { name: 'right', base: 'root', buildtags: ['q'] }
    };
    assert.deepEqual(resolveBuildTags('left', diamond), ['l', 'r']);
    assert.deepEqual(resolveBuildTags('right', diamond), ['q', 'r']);
  });

  it('does not treat inherited object keys as distributions', () => {
    const error = catchError(() => resolveBuildTags('toString', table));
    assert.ok(error instanceof DistributionNotFoundError);
  });
});

describe('build tag strings', () => {
  it('joins tags with commas and drops empty entries', () => {
    assert.equal(formatBuildTagsString(['a', '', 'b']), 'a,b');
    assert.equal(formatBuildTagsString([]), '');
  });

  it('splits and trims a comma-separated string', () => {
    assert.deepEqual(parseBuildTagsString(' a, b ,,c '), ['a', 'b', 'c']);
    assert.deepEqual(parseBuildTagsString(''), []);
  });
});

describe('distribution summaries', () => {
  it('lists names sorted', () => {
    assert.deepEqual(getDistributionChoices({ z: { name: 'z', buildtags: [] }, a: { name: 'a', buildtags: [] } }), ['a', 'z']);
  });

  it('describes a distribution with its resolved tags', () => {
    assert.deepEqual(describeDistribution('grandchild', table), {
      name: 'grandchild',
      base: 'child',
      description: 'Three levels',
      configFile: 'gc.yaml',
      buildTags: ['a', 'b', 'c', 'd']
    });
    assert.deepEqual(describeDistribution('base', table), { name: 'base', buildTags: ['a', 'b'] });
  });
});
