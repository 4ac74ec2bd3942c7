import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdir, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { BuildStepError } from '../../../src/core/build/build-errors.js';
import { runBuildPipeline } from '../../../src/core/build/build-pipeline.js';
import type { BuildOptions } from '../../../src/core/build/build-types.js';
import { createCollectingDiagnostics, type CollectingDiagnostics } from '../../../src/core/ports/diagnostics.js';
import type { ExecutionContext } from '../../../src/types/execution-context.js';
import { ErrorCodes, WarningCodes } from '../../../src/types/index.js';
import { CommandError, DistributionNotFoundError, ValidationError } from '../../../src/utils/errors.js';
import { createRecordingOutput, FakeRunner, makeTestDir, writeTree } from '../../test-helpers.js';

const LAYER_BYTES = 'fake-zip';

/**
 * Runner that behaves like the upstream repository's tooling: the clone
 * creates collector/Makefile, set-otelcol-version writes VERSION and
 * `make package` leaves the zip in collector/build.
 */
function createUpstreamRunner(version = '0.119.0'): FakeRunner {
  return new FakeRunner()
    .on('git clone', async call => {
      const targetDir = call.args[call.args.length - 1];
      await writeTree(targetDir, {
        'collector/Makefile': 'package:\n',
        'collector/go.mod': 'module example.com/collector\n',
        'collector/config.yaml': 'upstream: true\n'
      });
    })
    .on('make set-otelcol-version', async call => {
      await writeFile(join(call.cwd ?? '', 'VERSION'), `${version}\n`, 'utf8');
    })
    .on('make package', async call => {
      const arch = call.env?.GOARCH ?? 'unknown';
      await writeTree(call.cwd ?? '', { [`build/opentelemetry-collector-layer-${arch}.zip`]: LAYER_BYTES });
    });
}

describe('runBuildPipeline', () => {
  let root: string;
  let tempParent: string;
  let runner: FakeRunner;
  let diagnostics: CollectingDiagnostics;
  let output: ReturnType<typeof createRecordingOutput>;
  let ctx: ExecutionContext;

  const baseOptions = (): BuildOptions => ({
    distribution: 'clickhouse',
    architecture: 'arm64',
    upstreamRepo: 'example/upstream',
    upstreamRef: 'main',
    tempParent
  });

  beforeEach(async () => {
    root = await makeTestDir('otel-layer-build-');
    tempParent = join(root, 'tmp');
    await mkdir(tempParent);
    await writeTree(root, {
      'config/distributions.yaml': [
        'minimal:',
        '  buildtags: [lambdacomponents.custom]',
        'clickhouse:',
        '  base: minimal',
        '  config-file: ch.yaml',
        '  buildtags: [lambdacomponents.exporter.clickhouse]',
        'nocfg:',
        '  base: minimal',
        '  config-file: absent.yaml',
        ''
      ].join('\n'),
      'config/component_dependencies.yaml': [
        'dependencies:',
        '  lambdacomponents.exporter.clickhouse: example.com/clickhouse',
        '  lambdacomponents.exporter.awss3: example.com/awss3',
        ''
      ].join('\n'),
      'config/collector-configs/ch.yaml': 'custom: true\n',
      'components/exporter/clickhouse.go': 'package exporter\n',
      'components/exporter/awss3.go': 'package exporter\n'
    });

    runner = createUpstreamRunner();
    diagnostics = createCollectingDiagnostics();
    output = createRecordingOutput();
    ctx = { projectRoot: root, output, diagnostics, runner };
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('builds a distribution end to end', async () => {
    const result = await runBuildPipeline(baseOptions(), ctx);

    assert.deepEqual(result, {
      distribution: 'clickhouse',
      architecture: 'arm64',
      upstreamVersion: '0.119.0',
      buildTags: ['lambdacomponents.custom', 'lambdacomponents.exporter.clickhouse'],
      includedComponents: ['lambdacomponents.exporter.clickhouse'],
      modules: ['example.com/clickhouse'],
      configFile: 'ch.yaml',
      layerFile: join(root, 'build', 'collector-arm64-clickhouse.zip'),
      layerFileSize: LAYER_BYTES.length
    });
    assert.equal(await readFile(result.layerFile, 'utf8'), LAYER_BYTES);
    assert.deepEqual(diagnostics.warnings, []);

    const upstreamDir = runner.calls[0].args[6];
    assert.deepEqual(runner.commandLines(), [
      `git clone --depth 1 --branch main https://github.com/example/upstream.git ${upstreamDir}`,
      'make set-otelcol-version',
      'go mod edit -require=example.com/clickhouse@v0.119.0',
      'go mod tidy',
      'make package'
    ]);
    assert.deepEqual(runner.calls[4].env, {
      GOARCH: 'arm64',
      BUILDTAGS: 'lambdacomponents.custom,lambdacomponents.exporter.clickhouse'
    });
  });

  it('removes the temporary clone afterwards', async () => {
    await runBuildPipeline(baseOptions(), ctx);
    assert.deepEqual(await readdir(tempParent), []);
  });

  it('keeps the overlaid clone with keepTemp', async () => {
    const result = await runBuildPipeline({ ...baseOptions(), keepTemp: true }, ctx);

    assert.ok(result.tempDir);
    const collectorDir = join(result.tempDir, 'upstream', 'collector');
    assert.equal(await readFile(join(collectorDir, 'config.yaml'), 'utf8'), 'custom: true\n');
    assert.deepEqual(await readdir(join(collectorDir, 'lambdacomponents', 'exporter')), ['clickhouse.go']);
    assert.ok(output.lines.includes(`info: Keeping temporary directory: ${result.tempDir}`));
  });

  it('uses explicit tags and version without reading distributions', async () => {
    await rm(join(root, 'config', 'distributions.yaml'));

    const result = await runBuildPipeline(
      {
        ...baseOptions(),
        distribution: 'adhoc',
        architecture: 'amd64',
        buildTags: ['lambdacomponents.exporter.all', 'lambdacomponents.custom', 'lambdacomponents.custom'],
        upstreamVersion: 'v1.2.3'
      },
      ctx
    );

    assert.deepEqual(result.buildTags, ['lambdacomponents.exporter.all', 'lambdacomponents.custom']);
    assert.deepEqual(result.includedComponents, ['lambdacomponents.exporter.clickhouse', 'lambdacomponents.exporter.awss3']);
    assert.deepEqual(result.modules, ['example.com/awss3', 'example.com/clickhouse']);
    assert.equal(result.upstreamVersion, 'v1.2.3');
    assert.equal(result.configFile, undefined);
    assert.equal(result.layerFile, join(root, 'build', 'collector-amd64-adhoc.zip'));
    assert.ok(!runner.commandLines().includes('make set-otelcol-version'));
  });

  it('omits BUILDTAGS when the distribution has no tags', async () => {
    const result = await runBuildPipeline(
      { ...baseOptions(), distribution: 'plain', buildTags: [], upstreamVersion: '1.0.0', outputDir: 'out' },
      ctx
    );

    assert.equal(result.layerFile, join(root, 'out', 'collector-arm64-plain.zip'));
    assert.deepEqual(result.includedComponents, []);
    const packageCall = runner.calls.find(call => call.command === 'make' && call.args[0] === 'package');
    assert.deepEqual(packageCall?.env, { GOARCH: 'arm64' });
  });

  it('warns and continues when the collector config file is missing', async () => {
    const result = await runBuildPipeline({ ...baseOptions(), distribution: 'nocfg' }, ctx);

    assert.equal(result.configFile, 'absent.yaml');
    const missing = join(root, 'config', 'collector-configs', 'absent.yaml');
    assert.deepEqual(diagnostics.warnings, [
      {
        code: WarningCodes.CONFIG_FILE_MISSING,
        message: `Custom config file not found: ${missing}; using default upstream config.yaml`,
        details: { path: missing }
      }
    ]);
  });

  it('fails the first step for an unknown distribution', async () => {
    await assert.rejects(runBuildPipeline({ ...baseOptions(), distribution: 'missing' }, ctx), (error: unknown) => {
      assert.ok(error instanceof BuildStepError);
      assert.equal(error.step, 'resolve-build-tags');
      assert.deepEqual(error.details, { step: 'resolve-build-tags' });
      assert.equal(error.code, ErrorCodes.BUILD_FAILED);
      assert.equal(error.message, "Resolve build tags failed: Distribution 'missing' not found in configuration.");
      assert.ok(error.cause instanceof DistributionNotFoundError);
      return true;
    });
    assert.deepEqual(runner.calls, []);
  });

  it('reports a failing make package with the command error as cause', async () => {
    runner.failOn('make package', 'compile error');

    await assert.rejects(runBuildPipeline(baseOptions(), ctx), (error: unknown) => {
      assert.ok(error instanceof BuildStepError);
      assert.equal(error.step, 'package-layer');
      assert.equal(error.message, 'Build collector failed: Command failed: make package: compile error');
      assert.ok(error.cause instanceof CommandError);
      return true;
    });
    assert.deepEqual(await readdir(tempParent), []);
    assert.ok(output.lines.includes('spinner done: make package failed'));
    assert.ok(!output.lines.includes('spinner done: make package finished'));
  });

  it('does not report a failed clone as cloned', async () => {
    runner.failOn('git clone', 'repository not found');

    await assert.rejects(runBuildPipeline(baseOptions(), ctx), (error: unknown) => {
      assert.ok(error instanceof BuildStepError);
      assert.equal(error.step, 'clone-upstream');
      return true;
    });
    assert.ok(output.lines.includes('spinner done: Clone of https://github.com/example/upstream.git failed'));
    assert.ok(!output.lines.includes('spinner done: Cloned https://github.com/example/upstream.git'));
  });

  it('fails when set-otelcol-version writes no VERSION file', async () => {
    runner.on('make set-otelcol-version', () => {});

    await assert.rejects(runBuildPipeline(baseOptions(), ctx), (error: unknown) => {
      assert.ok(error instanceof BuildStepError);
      assert.equal(error.step, 'determine-upstream-version');
      assert.ok(error.cause instanceof ValidationError);
      const versionFile = join(runner.calls[0].args[6], 'collector', 'VERSION');
      assert.equal(error.cause.message, `Validation error: VERSION file not created: ${versionFile}`);
      return true;
    });
    assert.ok(!runner.commandLines().includes('make package'));
  });

  it('fails when the VERSION file is blank', async () => {
    runner.on('make set-otelcol-version', async call => {
      await writeFile(join(call.cwd ?? '', 'VERSION'), '  \n', 'utf8');
    });

    await assert.rejects(runBuildPipeline(baseOptions(), ctx), (error: unknown) => {
      assert.ok(error instanceof BuildStepError);
      assert.equal(error.step, 'determine-upstream-version');
      assert.ok(error.cause instanceof ValidationError);
      const versionFile = join(runner.calls[0].args[6], 'collector', 'VERSION');
      assert.equal(error.cause.message, `Validation error: VERSION file is empty: ${versionFile}`);
      return true;
    });
  });

  it('fails when the clone has no collector Makefile', async () => {
    runner.on('git clone', async call => {
      await writeTree(call.args[call.args.length - 1], { 'collector/go.mod': 'module example.com/collector\n' });
    });

    await assert.rejects(runBuildPipeline(baseOptions(), ctx), (error: unknown) => {
      assert.ok(error instanceof BuildStepError);
      assert.equal(error.step, 'determine-upstream-version');
      assert.ok(error.cause instanceof ValidationError);
      const makefile = join(runner.calls[0].args[6], 'collector', 'Makefile');
      assert.equal(error.cause.message, `Validation error: Makefile not found: ${makefile}`);
      return true;
    });
    assert.deepEqual(runner.commandLines().slice(1), []);
  });

  it('fails collect-output when make package produced no zip', async () => {
    runner.on('make package', () => {});

    await assert.rejects(runBuildPipeline(baseOptions(), ctx), (error: unknown) => {
      assert.ok(error instanceof BuildStepError);
      assert.equal(error.step, 'collect-output');
      return true;
    });
  });

  it('injects a simulated failure into the named step', async () => {
    await assert.rejects(runBuildPipeline({ ...baseOptions(), injectErrorAt: 'add-dependencies' }, ctx), (error: unknown) => {
      assert.ok(error instanceof BuildStepError);
      assert.equal(error.step, 'add-dependencies');
      assert.equal(error.message, "SIMULATED ERROR: Injected test failure in 'add-dependencies'");
      return true;
    });
    assert.ok(!runner.commandLines().some(line => line.startsWith('go ')));
    assert.deepEqual(await readdir(tempParent), []);
  });
});
