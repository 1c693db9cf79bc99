/**
 * Tests for media extraction
 */

import { describe, it, expect } from 'vitest';
import { extractImage, extractMedia, extractVideo } from '../../src/feeds/media';

describe('extractImage', () => {
  it('should prefer media:thumbnail', () => {
    expect(
      extractImage({
        'media:thumbnail': { '@_url': 'https://cdn.example.org/thumb.jpg' },
        'media:content': { '@_url': 'https://cdn.example.org/full.jpg', '@_medium': 'image' },
      })
    ).toBe('https://cdn.example.org/thumb.jpg');
  });

  it('should find image media:content inside media:group', () => {
    expect(
      extractImage({
        'media:group': {
          'media:content': [
            { '@_url': 'https://cdn.example.org/clip.mp4', '@_type': 'video/mp4' },
            { '@_url': 'https://cdn.example.org/poster.png', '@_type': 'image/png' },
          ],
        },
      })
    ).toBe('https://cdn.example.org/poster.png');
  });

  it('should use an image enclosure', () => {
    expect(
      extractImage({
        enclosure: { '@_url': 'https://cdn.example.org/photo.jpg', '@_type': 'image/jpeg', '@_length': '1200' },
      })
    ).toBe('https://cdn.example.org/photo.jpg');
  });

  it('should use itunes:image', () => {
    expect(extractImage({ 'itunes:image': { '@_href': 'https://cdn.example.org/cover.png' } })).toBe(
      'https://cdn.example.org/cover.png'
    );
  });

  it('should fall back to the first inline image', () => {
    expect(
      extractImage({ description: '<p><img alt="x" src="https://cdn.example.org/inline.png"> text</p>' })
    ).toBe('https://cdn.example.org/inline.png');
  });

  it('should ignore relative URLs', () => {
    expect(extractImage({ description: '<img src="/inline.png">' })).toBeNull();
    expect(extractImage({ 'media:thumbnail': { '@_url': '/thumb.jpg' } })).toBeNull();
  });
});

describe('extractVideo', () => {
  it('should skip videos above the size limit', () => {
    expect(
      extractVideo(
        {
          enclosure: [
            { '@_url': 'https://cdn.example.org/big.mp4', '@_type': 'video/mp4', '@_length': '1000' },
            { '@_url': 'https://cdn.example.org/unknown.mp4', '@_type': 'video/mp4' },
          ],
        },
        { maxVideoBytes: 500 }
      )
    ).toBe('https://cdn.example.org/unknown.mp4');
  });

  it('should accept a video medium without a type', () => {
    expect(
      extractVideo({ 'media:content': { '@_url': 'https://cdn.example.org/clip', '@_medium': 'video' } })
    ).toBe('https://cdn.example.org/clip');
  });
});

describe('extractMedia', () => {
  it('should return nulls when the entry has no media', () => {
    expect(extractMedia({ title: 'Plain entry' })).toEqual({ imageUrl: null, videoUrl: null });
  });
});
