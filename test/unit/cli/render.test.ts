import { describe, it, expect } from '@jest/globals';
import yaml from 'js-yaml';
import { inspectValues, type InspectionReport } from '@/app/inspector';
import { AppConfigSchema } from '@/config/app-config';
import { createLogger } from '@/lib/logger';
import { renderReport, renderTable, toReportView } from '@/cli/render';

const logger = createLogger({ level: 'silent' });

function inspect(values: unknown, overrides: object = {}): InspectionReport {
  const result = inspectValues(values, AppConfigSchema.parse(overrides), logger);
  if (!result.ok) {
    throw new Error(result.error);
  }
  return result.value;
}

const AMBIGUOUS_MESSAGE =
  'string found at path not typically used for images, but resembles an image reference: "foo:bar"';

describe('render', () => {
  describe('renderTable', () => {
    it('should pad cells to the widest value in each column', () => {
      expect(renderTable(['A', 'Bb'], [['x', 'yyy']])).toEqual([
        '┌───┬─────┐',
        '│ A │ Bb  │',
        '├───┼─────┤',
        '│ x │ yyy │',
        '└───┴─────┘',
      ]);
    });

    it('should render a header-only table', () => {
      expect(renderTable(['Path'], [])).toEqual(['┌──────┐', '│ Path │', '├──────┤', '└──────┘']);
    });
  });

  describe('toReportView', () => {
    it('should flatten detections and unsupported entries', () => {
      const view = toReportView(
        inspect({ image: 'nginx:1.25', weirdField: 'foo:bar' }, { detection: { strict: true } }),
      );

      expect(view).toEqual({
        detected: [{ path: 'image', pattern: 'string', image: 'docker.io/library/nginx:1.25', templated: false }],
        unsupported: [
          {
            path: 'weirdField',
            classification: 'ambiguous-path',
            code: 'AMBIGUOUS_STRING_PATH',
            message: AMBIGUOUS_MESSAGE,
          },
        ],
        proposals: [],
      });
    });

    it('should show templated values as written', () => {
      const view = toReportView(
        inspect({ image: 'quay.io/org/app:{{ .Values.tag }}' }, { detection: { templateMode: true } }),
      );

      expect(view.detected).toEqual([
        { path: 'image', pattern: 'string', image: 'quay.io/org/app:{{ .Values.tag }}', templated: true },
      ]);
    });
  });

  describe('renderReport', () => {
    it('should render detections as a table', () => {
      const lines = renderReport(inspect({ image: 'nginx:1.25' }), 'table').split('\n');

      expect(lines[0]).toBe('Detected images (1):');
      expect(lines[2]).toBe('│ Path  │ Image                        │ Pattern │');
      expect(lines[4]).toBe('│ image │ docker.io/library/nginx:1.25 │ string  │');
      expect(lines).toHaveLength(6);
    });

    it('should mark templated rows', () => {
      const output = renderReport(
        inspect({ image: '{{ .Values.image }}' }, { detection: { templateMode: true } }),
        'table',
      );

      expect(output.split('\n')[4]).toBe('│ image │ {{ .Values.image }} │ string (templated) │');
    });

    it('should report the global registry and an empty result', () => {
      const output = renderReport(inspect({ global: { imageRegistry: 'registry.example.com' } }), 'table');

      expect(output).toBe('Global registry: registry.example.com\n\nNo images detected');
    });

    it('should add unsupported and proposal sections', () => {
      const lines = renderReport(
        inspect(
          { image: 'nginx:1.25', weirdField: 'foo:bar' },
          { detection: { strict: true }, rewrite: { targetRegistry: 'mirror.example.com' } },
        ),
        'table',
      ).split('\n');

      expect(lines[6]).toBe('');
      expect(lines[7]).toBe('Unsupported (1):');
      expect(lines[11]).toBe(`│ weirdField │ ambiguous-path │ ${AMBIGUOUS_MESSAGE} │`);
      expect(lines[13]).toBe('');
      expect(lines[14]).toBe('Proposed targets (1):');
      expect(lines[18]).toBe(
        '│ image │ docker.io/library/nginx:1.25 │ mirror.example.com/dockerio/library/nginx:1.25 │',
      );
    });

    it('should render JSON', () => {
      const output = renderReport(inspect({ image: 'nginx:1.25' }), 'json');

      expect(JSON.parse(output)).toEqual({
        detected: [{ path: 'image', pattern: 'string', image: 'docker.io/library/nginx:1.25', templated: false }],
        unsupported: [],
        proposals: [],
      });
    });

    it('should render YAML', () => {
      const output = renderReport(
        inspect({ global: { imageRegistry: 'registry.example.com' }, app: { image: { repository: 'team/app', tag: '1.0' } } }),
        'yaml',
      );

      expect(yaml.load(output)).toEqual({
        detected: [{ path: 'app.image', pattern: 'global', image: 'registry.example.com/team/app:1.0', templated: false }],
        unsupported: [],
        proposals: [],
        globalRegistry: 'registry.example.com',
      });
      expect(output.endsWith('\n')).toBe(false);
    });
  });
});
