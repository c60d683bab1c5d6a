import { describe, it, expect } from '@jest/globals';
import { classifyPath, isKnownImagePath, isNonImagePath } from '@/lib/image/path-patterns';
import type { ValuePath } from '@/types/values';

describe('classifyPath', () => {
  it.each<[ValuePath]>([
    [['image']],
    [['app', 'image']],
    [['workerImage']],
    [['init_image']],
    [['proxy-image']],
    [['images', 0]],
    [['spec', 'template', 'spec', 'containers', 0, 'image']],
    [['initContainers', 1, 'image']],
  ])('should classify %j as an image path', (path) => {
    expect(classifyPath(path)).toBe('image');
  });

  it.each<[ValuePath]>([
    [['app', 'tag']],
    [['image', 'repository']],
    [['image', 'pullPolicy']],
    [['spec', 'ports', 'port']],
    [['podAnnotations', 'image']],
    [['commonLabels', 'app']],
    [['containers', 0, 'name']],
    [['args', 0]],
    [['env', 0, 'value']],
    [['resources', 'limits', 'cpu']],
    [['metrics', 'enabled']],
    [['imagePullSecrets', 0]],
  ])('should classify %j as a non-image path', (path) => {
    expect(classifyPath(path)).toBe('non-image');
  });

  it.each<[ValuePath]>([[['weirdField']], [['config', 'mode']], [[]]])('should classify %j as unknown', (path) => {
    expect(classifyPath(path)).toBe('unknown');
  });

  it('should expose boolean helpers', () => {
    expect(isKnownImagePath(['image'])).toBe(true);
    expect(isNonImagePath(['image'])).toBe(false);
    expect(isNonImagePath(['service', 'port'])).toBe(true);
  });
});
