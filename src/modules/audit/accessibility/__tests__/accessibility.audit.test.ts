/**
 * Accessibility Audit Tests
 */

import { AccessibilityAuditService } from '../accessibility.audit';
import * as checks from '../accessibility.checks';
import { FakeBrowserProvider } from '../../../../__tests__/helpers/mocks';

const PAGE_URL = 'https://shop.test/contact';

const contactHtml = `
<html>
<head><title>Contact us</title></head>
<body>
  <a href="#main">Skip to content</a>
  <h1>Contact us</h1>
  <img src="/map.png">
  <img src="/team.jpg" alt="Our support team">
  <form>
    <label for="email">Email</label>
    <input id="email" type="email">
    <textarea></textarea>
  </form>
</body>
</html>
`;

describe('AccessibilityAuditService', () => {
  let browser: FakeBrowserProvider;
  let service: AccessibilityAuditService;

  beforeEach(() => {
    browser = new FakeBrowserProvider({
      [PAGE_URL]: {
        html: contactHtml,
        textStyleSamples: [
          { tagName: 'h1', index: 0, text: 'Contact us', color: 'rgb(0, 0, 0)', backgroundColor: 'rgb(255, 255, 255)' },
          {
            tagName: 'p',
            index: 1,
            text: 'Fine print',
            color: 'rgb(200, 200, 200)',
            backgroundColor: 'rgb(255, 255, 255)',
          },
        ],
      },
      'https://shop.test/gone': { html: '', status: 410 },
      'https://shop.test/broken': { html: '', error: 'net::ERR_CONNECTION_RESET' },
    });
    service = new AccessibilityAuditService(browser);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should start contrast sampling before the DOM checks finish', async () => {
    const altText = jest.spyOn(checks, 'checkAltText');
    const contrast = jest.spyOn(checks, 'checkContrast');
    const aria = jest.spyOn(checks, 'checkAriaLabels');

    const result = await service.audit(PAGE_URL, { headless: true, timeoutSeconds: 30 });

    expect(result.ok).toBe(true);
    expect(altText.mock.invocationCallOrder[0]).toBeLessThan(contrast.mock.invocationCallOrder[0]);
    expect(contrast.mock.invocationCallOrder[0]).toBeLessThan(aria.mock.invocationCallOrder[0]);
  });

  it('should combine the three checks into one report', async () => {
    const result = await service.audit(PAGE_URL, { headless: true, timeoutSeconds: 30 });
    if (!result.ok) throw new Error(result.failure.error);

    const { accessibility_summary: summary, audit_info: info } = result.data;
    // alt: 1 violation, 1 pass; contrast: 1 and 1; aria: 1 violation, 3 passes (label, h1, skip link)
    expect(summary.total_violations).toBe(3);
    expect(summary.total_passes).toBe(5);
    expect(summary.accessibility_score).toBe(62);
    expect(summary.violations_by_severity).toEqual({ critical: 0, serious: 1, moderate: 0, minor: 2 });
    expect(summary.recommendations).toEqual([
      'Add alt attributes to 1 images without alt text',
      'Fix 1 color contrast issues',
      'Add accessible labels to 1 interactive elements',
      'Accessibility needs improvement. Prioritize critical and serious violations',
    ]);
    expect(info).toMatchObject({
      url: PAGE_URL,
      page_title: 'Contact us',
      wcag_level: 'AA',
      checks_performed: [
        'image_alt_text',
        'color_contrast',
        'aria_labels',
        'form_labeling',
        'heading_structure',
        'skip_links',
      ],
    });
    expect(browser.closedSessions).toBe(1);
  });

  it('should fail on an error status', async () => {
    const result = await service.audit('https://shop.test/gone', { headless: true, timeoutSeconds: 30 });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failure.error).toBe('Failed to load page. HTTP status: 410');
  });

  it('should fail when navigation throws', async () => {
    const result = await service.audit('https://shop.test/broken', { headless: true, timeoutSeconds: 30 });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failure.error).toBe('Accessibility audit failed: net::ERR_CONNECTION_RESET');
    expect(result.failure.context).toEqual({
      audit_info: { url: 'https://shop.test/broken', audit_time: expect.any(Number) },
    });
  });
});
