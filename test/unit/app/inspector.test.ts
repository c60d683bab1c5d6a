import { describe, it, expect } from '@jest/globals';
import { join } from 'path';
import { inspectValues, loadValuesFile } from '@/app/inspector';
import { AppConfigSchema, type AppConfig } from '@/config/app-config';
import { findImageError, formatReference } from '@/lib/image';
import { createLogger } from '@/lib/logger';
import { formatPath } from '@/types';

const VALUES_DIR = join(__dirname, '../../fixtures/values');
const logger = createLogger({ level: 'silent' });

function config(overrides: { detection?: object; rewrite?: object } = {}): AppConfig {
  return AppConfigSchema.parse(overrides);
}

async function loadChartValues(): Promise<unknown> {
  const result = await loadValuesFile(join(VALUES_DIR, 'chart-values.yaml'));
  if (!result.ok) {
    throw new Error(result.error);
  }
  return result.value;
}

describe('inspector', () => {
  describe('loadValuesFile', () => {
    it('should decode YAML values', async () => {
      const values = await loadChartValues();

      expect(values).toMatchObject({
        global: { imageRegistry: 'registry.example.com' },
        image: { repository: 'team/api', tag: '2.4.1' },
      });
    });

    it('should decode an empty document to an empty map', async () => {
      const result = await loadValuesFile(join(VALUES_DIR, 'empty.yaml'));

      expect(result).toEqual({ ok: true, value: {} });
    });

    it('should report YAML syntax errors', async () => {
      const path = join(VALUES_DIR, 'invalid.yaml');
      const result = await loadValuesFile(path);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.startsWith(`Failed to parse YAML in ${path}: `)).toBe(true);
        expect(result.guidance?.hint).toBe('The values file is not valid YAML');
      }
    });

    it('should report unreadable files', async () => {
      const path = join(VALUES_DIR, 'missing.yaml');
      const result = await loadValuesFile(path);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.startsWith(`Failed to read ${path}: `)).toBe(true);
        expect(result.guidance?.details).toEqual({ file: path });
      }
    });
  });

  describe('inspectValues', () => {
    it('should detect every image in chart values', async () => {
      const result = inspectValues(await loadChartValues(), config(), logger);

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.globalRegistry).toBe('registry.example.com');
        expect(result.value.detected.map((d) => [formatPath(d.path), formatReference(d.reference), d.pattern])).toEqual([
          ['image', 'registry.example.com/team/api:2.4.1', 'global'],
          ['worker.image', 'quay.io/org/worker:v1.0.0', 'map'],
          ['sidecars[0].image', 'docker.io/envoyproxy/envoy:v1.29.0', 'string'],
          ['sidecars[1].image', 'registry.example.com/prom/statsd-exporter:v0.26.0', 'string'],
        ]);
        expect(result.value.unsupported).toEqual([]);
        expect(result.value.proposals).toEqual([]);
      }
    });

    it('should report out-of-scope and templated values in strict mode', async () => {
      const result = inspectValues(
        await loadChartValues(),
        config({ detection: { sourceRegistries: ['docker.io'], strict: true } }),
        logger,
      );

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.detected.map((d) => formatPath(d.path))).toEqual(['sidecars[0].image']);
        expect(
          result.value.unsupported.map((u) => [formatPath(u.path), u.classification, findImageError(u.cause)?.code]),
        ).toEqual([
          ['image', 'non-source-registry', 'NON_SOURCE_REGISTRY'],
          ['worker.image', 'non-source-registry', 'NON_SOURCE_REGISTRY'],
          ['sidecars[1].image', 'non-source-registry', 'NON_SOURCE_REGISTRY'],
          ['migrationImage', 'malformed-string', 'TEMPLATE_VARIABLE_DETECTED'],
        ]);
      }
    });

    it('should propose targets under the target registry', async () => {
      const result = inspectValues(
        await loadChartValues(),
        config({ rewrite: { targetRegistry: 'mirror.example.com' } }),
        logger,
      );

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.proposals).toEqual([
          {
            path: 'image',
            source: 'registry.example.com/team/api:2.4.1',
            target: 'mirror.example.com/registryexamplecom/team/api:2.4.1',
          },
          {
            path: 'worker.image',
            source: 'quay.io/org/worker:v1.0.0',
            target: 'mirror.example.com/quayio/org/worker:v1.0.0',
          },
          {
            path: 'sidecars[0].image',
            source: 'docker.io/envoyproxy/envoy:v1.29.0',
            target: 'mirror.example.com/dockerio/envoyproxy/envoy:v1.29.0',
          },
          {
            path: 'sidecars[1].image',
            source: 'registry.example.com/prom/statsd-exporter:v0.26.0',
            target: 'mirror.example.com/registryexamplecom/prom/statsd-exporter:v0.26.0',
          },
        ]);
      }
    });

    it('should prefer a mapped target over the default target registry', async () => {
      const result = inspectValues(
        await loadChartValues(),
        config({
          rewrite: {
            targetRegistry: 'mirror.example.com',
            registryMappings: [
              { source: 'index.docker.io', target: 'hub-mirror.example.com' },
              { source: 'quay.io', target: 'quay-mirror.example.com' },
            ],
          },
        }),
        logger,
      );

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.proposals.map((p) => p.target)).toEqual([
          'mirror.example.com/registryexamplecom/team/api:2.4.1',
          'quay-mirror.example.com/quayio/org/worker:v1.0.0',
          'hub-mirror.example.com/dockerio/envoyproxy/envoy:v1.29.0',
          'mirror.example.com/registryexamplecom/prom/statsd-exporter:v0.26.0',
        ]);
      }
    });

    it('should only propose mapped registries without a default target', async () => {
      const result = inspectValues(
        await loadChartValues(),
        config({ rewrite: { registryMappings: [{ source: 'docker.io', target: 'hub-mirror.example.com' }] } }),
        logger,
      );

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.proposals).toEqual([
          {
            path: 'sidecars[0].image',
            source: 'docker.io/envoyproxy/envoy:v1.29.0',
            target: 'hub-mirror.example.com/dockerio/envoyproxy/envoy:v1.29.0',
          },
        ]);
      }
    });

    it('should use the configured path strategy', () => {
      const result = inspectValues(
        { image: 'nginx:1.25' },
        config({ rewrite: { targetRegistry: 'mirror.example.com', pathStrategy: 'flat' } }),
        logger,
      );

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.proposals.map((p) => p.target)).toEqual(['mirror.example.com/dockerio-library-nginx:1.25']);
      }
    });

    it('should not propose targets for templated images', () => {
      const result = inspectValues(
        { image: 'quay.io/org/app:{{ .Values.tag }}' },
        config({ detection: { templateMode: true }, rewrite: { targetRegistry: 'mirror.example.com' } }),
        logger,
      );

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.detected).toHaveLength(1);
        expect(result.value.proposals).toEqual([]);
      }
    });

    it('should fail with guidance on a malformed image map', () => {
      const result = inspectValues({ image: { repository: 123 } }, config(), logger);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBe(
          'Image detection failed at "image": error processing path "image": image map has invalid repository type (must be string): got number',
        );
        expect(result.guidance?.resolution).toBe('Correct the value at "image" or remove the map');
        expect(result.guidance?.details).toEqual({ path: 'image', code: 'INVALID_IMAGE_MAP_REPO' });
      }
    });

    it('should reject values that are not plain data', () => {
      const result = inspectValues({ app: { ports: new Map() } }, config(), logger);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBe('Unsupported value in document: Unsupported object value at "app.ports"');
      }
    });
  });
});
