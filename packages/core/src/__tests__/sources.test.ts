import { describe, it, expect } from 'vitest';
import { MissingFieldError } from '../errors.js';
import {
  collectSources,
  customToStep,
  gcsToContainer,
  gitToContainer,
  makeSourceArtifacts,
  sourcePath,
} from '../sources.js';
import type { SourceSpec } from '../types.js';
import { makeBuild, TEST_IMAGES } from './helpers.js';

const implicit = {
  volumeMounts: [
    { name: 'workspace', mountPath: '/workspace' },
    { name: 'home', mountPath: '/builder/home' },
  ],
  workingDir: '/workspace',
  env: [{ name: 'HOME', value: '/builder/home' }],
};

describe('collectSources', () => {
  it('puts the primary source before additional sources', () => {
    const primary: SourceSpec = { kind: 'git', name: 'primary', git: { url: 'u', revision: 'r' } };
    const extra: SourceSpec = { kind: 'gcs', name: 'extra', gcs: { type: 'Archive', location: 'gs://b/o' } };
    expect(collectSources(makeBuild({ source: primary, sources: [extra] }))).toEqual([primary, extra]);
  });

  it('is empty without sources', () => {
    expect(collectSources(makeBuild())).toEqual([]);
  });
});

describe('sourcePath', () => {
  it('names the primary source spec.source', () => {
    const build = makeBuild({ source: { kind: 'git', git: { url: 'u', revision: 'r' } } });
    expect(sourcePath(build, 0)).toBe('spec.source');
    expect(sourcePath(build, 2)).toBe('spec.sources.1');
  });

  it('indexes additional sources directly without a primary source', () => {
    expect(sourcePath(makeBuild(), 0)).toBe('spec.sources.0');
  });
});

describe('gitToContainer', () => {
  it('fetches url and revision', () => {
    const container = gitToContainer(
      { kind: 'git', git: { url: 'https://example.com/repo.git', revision: 'main' } },
      0,
      'git:test',
    );

    expect(container).toEqual({
      name: 'build-step-git-source-0',
      image: 'git:test',
      args: ['-url', 'https://example.com/repo.git', '-revision', 'main'],
      ...implicit,
    });
  });

  it('adds -path for a target path and uses the source name', () => {
    const container = gitToContainer(
      { kind: 'git', name: 'app', targetPath: 'src/app', git: { url: 'https://example.com/repo.git', revision: 'v1' } },
      2,
      'git:test',
    );

    expect(container.name).toBe('build-step-git-source-app');
    expect(container.args).toEqual(['-url', 'https://example.com/repo.git', '-revision', 'v1', '-path', 'src/app']);
  });

  it('requires a url', () => {
    const run = () => gitToContainer({ kind: 'git', git: { url: '', revision: 'main' } }, 0, 'git:test');
    expect(run).toThrow(MissingFieldError);
    expect(run).toThrow('missing field(s): spec.source.git.url');
  });

  it('requires a revision', () => {
    try {
      gitToContainer({ kind: 'git', git: { url: 'https://example.com/repo.git', revision: '' } }, 0, 'git:test');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(MissingFieldError);
      expect(err).toMatchObject({ code: 'MISSING_FIELD', path: 'spec.source.git.revision' });
    }
  });
});

describe('gcsToContainer', () => {
  it('passes type and location', () => {
    const container = gcsToContainer(
      { kind: 'gcs', gcs: { type: 'Manifest', location: 'gs://bucket/manifest.json' } },
      1,
      'gcs:test',
    );

    expect(container).toEqual({
      name: 'build-step-gcs-source-1',
      image: 'gcs:test',
      args: ['--type', 'Manifest', '--location', 'gs://bucket/manifest.json'],
      ...implicit,
    });
  });

  it('joins the target path under the workspace', () => {
    const container = gcsToContainer(
      { kind: 'gcs', name: 'assets', targetPath: 'assets/', gcs: { type: 'Archive', location: 'gs://bucket/a.tgz' } },
      0,
      'gcs:test',
    );

    expect(container.name).toBe('build-step-gcs-source-assets');
    expect(container.args).toEqual([
      '--type',
      'Archive',
      '--location',
      'gs://bucket/a.tgz',
      '--dest_dir',
      '/workspace/assets/',
    ]);
  });

  it('requires a location', () => {
    expect(() => gcsToContainer({ kind: 'gcs', gcs: { type: 'Archive', location: '' } }, 0, 'gcs:test')).toThrow(
      'missing field(s): spec.source.gcs.location',
    );
  });
});

describe('customToStep', () => {
  it('names an unnamed container custom-source', () => {
    const step = customToStep({ kind: 'custom', custom: { name: '', image: 'fetcher', args: ['--all'] } });

    expect(step).toEqual({
      origin: { kind: 'custom-source', sourceName: undefined },
      container: { name: 'custom-source', image: 'fetcher', args: ['--all'] },
    });
  });

  it('appends the source name', () => {
    const step = customToStep({ kind: 'custom', name: 'tools', custom: { name: '', image: 'fetcher' } });
    expect(step.container.name).toBe('custom-source-tools');
    expect(step.origin).toEqual({ kind: 'custom-source', sourceName: 'tools' });
  });

  it('rejects a container that already has a name', () => {
    expect(() => customToStep({ kind: 'custom', custom: { name: 'mine', image: 'fetcher' } })).toThrow(
      'missing field(s): spec.source.custom.name',
    );
  });

  it('copies the container', () => {
    const custom = { name: '', image: 'fetcher', args: ['a'] };
    const step = customToStep({ kind: 'custom', custom });
    step.container.args?.push('b');
    expect(custom).toEqual({ name: '', image: 'fetcher', args: ['a'] });
  });
});

describe('makeSourceArtifacts', () => {
  it('keeps fetch containers and custom steps in declaration order', () => {
    const build = makeBuild({
      source: { kind: 'custom', name: 'first', custom: { name: '', image: 'c1' } },
      sources: [
        { kind: 'git', git: { url: 'u', revision: 'r' } },
        { kind: 'custom', name: 'second', custom: { name: '', image: 'c2' } },
        { kind: 'gcs', gcs: { type: 'Archive', location: 'gs://b/o' } },
      ],
    });

    const artifacts = makeSourceArtifacts(build, TEST_IMAGES);

    expect(artifacts.containers.map((c) => c.name)).toEqual(['build-step-git-source-1', 'build-step-gcs-source-3']);
    expect(artifacts.containers.map((c) => c.image)).toEqual(['test-git:1', 'test-gcs:1']);
    expect(artifacts.steps.map((s) => s.container.name)).toEqual(['custom-source-second', 'custom-source-first']);
    expect(artifacts.workspaceSubPath).toBe('');
  });

  it('uses the last non-empty sub-path', () => {
    const build = makeBuild({
      sources: [
        { kind: 'git', subPath: 'one', git: { url: 'u', revision: 'r' } },
        { kind: 'git', subPath: 'two', git: { url: 'u', revision: 'r' } },
        { kind: 'git', git: { url: 'u', revision: 'r' } },
      ],
    });

    expect(makeSourceArtifacts(build, TEST_IMAGES).workspaceSubPath).toBe('two');
  });

  it('skips sources of an unknown kind', () => {
    const future: SourceSpec = JSON.parse('{"kind":"hg","subPath":"ignored","hg":{"url":"u"}}');
    const build = makeBuild({ sources: [future, { kind: 'git', git: { url: 'u', revision: 'r' } }] });

    const artifacts = makeSourceArtifacts(build, TEST_IMAGES);

    expect(artifacts.containers.map((c) => c.name)).toEqual(['build-step-git-source-1']);
    expect(artifacts.steps).toEqual([]);
    expect(artifacts.workspaceSubPath).toBe('');
  });

  it('propagates validation errors', () => {
    const build = makeBuild({ sources: [{ kind: 'git', git: { url: 'u', revision: '' } }] });
    expect(() => makeSourceArtifacts(build, TEST_IMAGES)).toThrow(MissingFieldError);
  });

  it('names the offending additional source in field errors', () => {
    const build = makeBuild({
      source: { kind: 'git', git: { url: 'u', revision: 'r' } },
      sources: [{ kind: 'custom', custom: { name: 'preset', image: 'fetcher' } }],
    });
    expect(() => makeSourceArtifacts(build, TEST_IMAGES)).toThrow('missing field(s): spec.sources.0.custom.name');
  });
});
