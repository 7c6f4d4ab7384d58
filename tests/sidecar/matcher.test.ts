import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  isMediaFile,
  matchMediaFile,
  MATCH_FAILURE_REASONS,
  parseSidecarName
} from '../../src/sidecar/matcher.js';

async function touch(dir: string, ...names: string[]): Promise<void> {
  for (const name of names) {
    await writeFile(join(dir, name), '');
  }
}

describe('parseSidecarName', () => {
  it('splits a plain sidecar name', () => {
    expect(parseSidecarName('IMG_0001.jpg.json')).toEqual({
      baseName: 'IMG_0001',
      extension: '.jpg',
      mediaName: 'IMG_0001.jpg'
    });
  });

  it('drops the supplemental suffix and preserves extension case', () => {
    expect(parseSidecarName('IMG_0002.JPG.supplemental-metadata.JSON')).toEqual({
      baseName: 'IMG_0002',
      extension: '.JPG',
      supplementalSuffix: '.supplemental-metadata',
      mediaName: 'IMG_0002.JPG'
    });
  });

  it('recognizes a truncated supplemental suffix', () => {
    expect(parseSidecarName('PXL_20210101_000000000.jpg.suppl.json')?.mediaName).toBe(
      'PXL_20210101_000000000.jpg'
    );
  });

  it('keeps dots inside the base name', () => {
    expect(parseSidecarName('my.holiday.heic.json')).toEqual({
      baseName: 'my.holiday',
      extension: '.heic',
      mediaName: 'my.holiday.heic'
    });
  });

  it('rejects names without a media extension', () => {
    expect(parseSidecarName('metadata.json')).toBeNull();
    expect(parseSidecarName('.json')).toBeNull();
    expect(parseSidecarName('IMG_0001.jpg')).toBeNull();
  });
});

describe('isMediaFile', () => {
  it('accepts allow-listed extensions in any case', () => {
    expect(isMediaFile('clip.MOV')).toBe(true);
    expect(isMediaFile('photo.heic')).toBe(true);
  });

  it('rejects sidecars and unsupported files', () => {
    expect(isMediaFile('photo.jpg.json')).toBe(false);
    expect(isMediaFile('photo.jpg.txt')).toBe(false);
    expect(isMediaFile('clip.avi')).toBe(false);
  });
});

describe('matchMediaFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tdr-matcher-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('finds an exact match', async () => {
    await touch(dir, 'IMG_0001.jpg', 'IMG_0001.jpg.json');

    const result = await matchMediaFile(join(dir, 'IMG_0001.jpg.json'));

    expect(result).toMatchObject({
      matched: true,
      mediaPath: join(dir, 'IMG_0001.jpg'),
      strategy: 'exact'
    });
  });

  it('strips the supplemental suffix and falls back to trailing characters', async () => {
    await touch(dir, 'IMG_0002.jpg(1).jpg', 'IMG_0002.jpg.supplemental-metadata.json');

    const result = await matchMediaFile(join(dir, 'IMG_0002.jpg.supplemental-metadata.json'));

    expect(result).toMatchObject({
      matched: true,
      mediaPath: join(dir, 'IMG_0002.jpg(1).jpg'),
      strategy: 'trailing'
    });
  });

  it('falls back to the name before the first dot', async () => {
    await touch(dir, 'IMG_0003-edited.jpg', 'IMG_0003.jpg.json');

    const result = await matchMediaFile(join(dir, 'IMG_0003.jpg.json'));

    expect(result).toMatchObject({
      matched: true,
      mediaPath: join(dir, 'IMG_0003-edited.jpg'),
      strategy: 'prefix'
    });
  });

  it('skips hits with unsupported extensions', async () => {
    await touch(dir, 'IMG_0004.jpg.txt', 'IMG_0004.png', 'IMG_0004.jpg.json');

    const result = await matchMediaFile(join(dir, 'IMG_0004.jpg.json'));

    expect(result).toMatchObject({ matched: true, mediaPath: join(dir, 'IMG_0004.png'), strategy: 'prefix' });
  });

  it('breaks ties lexicographically', async () => {
    await touch(dir, 'IMG_0005.jpg(2).jpg', 'IMG_0005.jpg(1).jpg', 'IMG_0005.jpg.json');

    const result = await matchMediaFile(join(dir, 'IMG_0005.jpg.json'));

    expect(result).toMatchObject({ matched: true, mediaPath: join(dir, 'IMG_0005.jpg(1).jpg') });
  });

  it('matches uppercase media extensions', async () => {
    await touch(dir, 'IMG_0007.JPG', 'IMG_0007.JPG.json');

    const result = await matchMediaFile(join(dir, 'IMG_0007.JPG.json'));

    expect(result).toMatchObject({ matched: true, mediaPath: join(dir, 'IMG_0007.JPG'), strategy: 'exact' });
  });

  it('reports unrecognized sidecar names', async () => {
    await touch(dir, 'metadata.json', 'metadata.jpg');

    const result = await matchMediaFile(join(dir, 'metadata.json'));

    expect(result).toEqual({ matched: false, reason: MATCH_FAILURE_REASONS.unrecognized });
  });

  it('reports a missing media file', async () => {
    await touch(dir, 'IMG_0006.jpg.json');

    const result = await matchMediaFile(join(dir, 'IMG_0006.jpg.json'));

    expect(result).toEqual({ matched: false, reason: 'no media file found' });
  });

  it('uses an injected directory lister', async () => {
    const result = await matchMediaFile('/album/IMG_0008.mp4.json', async directory => {
      expect(directory).toBe('/album');
      return ['IMG_0008.mp4.json', 'IMG_0008.mp4'];
    });

    expect(result).toMatchObject({ matched: true, mediaPath: join('/album', 'IMG_0008.mp4') });
  });
});
