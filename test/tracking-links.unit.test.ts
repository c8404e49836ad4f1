// Unit tests for site, image and tracking links
import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  appendQueryParameters,
  buildAlbumCaptionSlug,
  buildAlbumUrl,
  buildImageUrl,
  buildPatternUrl,
  buildTrackingUrl,
  buildUnsubscribeUrl,
  formatEmailId,
  getLinkSettings,
  hasQueryParameter
} from '../src/shared/utils/tracking-links';

const NOW = new Date('2026-03-05T23:30:00Z');

describe('Tracking Links Unit Tests', () => {
  it('should derive link settings from the environment', () => {
    expect(getLinkSettings()).toEqual({
      siteBaseUrl: 'https://patterns.example.com',
      imageBaseUrl: 'https://cdn.example.com',
      photoPrefix: 'photos',
      albumUrlTemplate: ''
    });
  });

  it('should number pattern pages from zero', () => {
    expect(buildPatternUrl('Sleepy Kitten', 7, '00042')).toBe('https://patterns.example.com/Sleepy-Kitten-7-41-Free-Design.aspx');
    expect(buildPatternUrl('  ', 7, '00001')).toBe('https://patterns.example.com/Cross-stitch-pattern-7-0-Free-Design.aspx');
    expect(buildPatternUrl('Odd', 7, 'abc')).toBe('https://patterns.example.com/Odd-7-0-Free-Design.aspx');
  });

  it('should build the public photo URL', () => {
    expect(buildImageUrl(7, 123)).toBe('https://cdn.example.com/photos/7/123/4.jpg');
  });

  it('should format the email id in UTC', () => {
    expect(formatEmailId(NOW)).toBe('260305');
  });

  it('should find query parameters case-insensitively and ignore the fragment', () => {
    expect(hasQueryParameter('https://x.test/a?CID=1&b=2', 'cid')).toBe(true);
    expect(hasQueryParameter('https://x.test/a?b=2#cid=1', 'cid')).toBe(false);
    expect(hasQueryParameter('https://x.test/a', 'cid')).toBe(false);
    expect(hasQueryParameter('https://x.test/a?flag', 'flag')).toBe(true);
  });

  it('should keep the fragment at the end when appending', () => {
    expect(appendQueryParameters('https://x.test/a?b=2#top', ['c=3'])).toBe('https://x.test/a?b=2&c=3#top');
    expect(appendQueryParameters('', ['c=3'])).toBe('');
  });

  it('should add only the tracking parameters the URL lacks', () => {
    expect(buildTrackingUrl('https://x.test/a?cid=old&UTM_SOURCE=x#top', 'c1', 'e1', NOW))
      .toBe('https://x.test/a?cid=old&UTM_SOURCE=x&eid=e1&utm_medium=email&utm_campaign=2026-03-05#top');
    expect(buildTrackingUrl('https://x.test/a', ' ', undefined, NOW))
      .toBe('https://x.test/a?utm_source=newsletter&utm_medium=email&utm_campaign=2026-03-05');
    expect(buildTrackingUrl('https://x.test/a', 'a b&c', undefined, NOW))
      .toBe('https://x.test/a?cid=a%20b%26c&utm_source=newsletter&utm_medium=email&utm_campaign=2026-03-05');
  });

  /**
   * **Feature: design-publishing, Property 6: Tracking is applied at most once**
   */
  it('should leave an already tracked URL unchanged', () => {
    fc.assert(
      fc.property(
        fc.domain(),
        fc.stringMatching(/^[a-z0-9]{1,12}$/),
        fc.stringMatching(/^[0-9]{6}$/),
        (domain, cid, eid) => {
          const once = buildTrackingUrl(`https://${domain}/patterns`, cid, eid, NOW);

          expect(buildTrackingUrl(once, cid, eid, NOW)).toBe(once);
          expect(once.split('cid=')).toHaveLength(2);
        }
      )
    );
  });

  it('should build unsubscribe links and caption slugs', () => {
    expect(buildUnsubscribeUrl('https://patterns.example.com/unsubscribe', 'a+b/c')).toBe('https://patterns.example.com/unsubscribe?token=a%2Bb%2Fc');
    expect(buildAlbumCaptionSlug('  winter & SNOW scenes 2 ', '0003')).toBe('Winter-Snow-Scenes-2');
    expect(buildAlbumCaptionSlug('!!!', '0003')).toBe('Album-0003');
  });

  it('should build album pages from the default pattern or a template', () => {
    expect(buildAlbumUrl('0003', 'winter scenes')).toBe('https://patterns.example.com/Free-Winter-Scenes-Charts.aspx');
    expect(buildAlbumUrl('0003', undefined, {
      ...getLinkSettings(),
      albumUrlTemplate: 'https://shop.example.com/albums/{AlbumId}/{CaptionSlug}'
    })).toBe('https://shop.example.com/albums/0003/Album-0003');
  });
});
