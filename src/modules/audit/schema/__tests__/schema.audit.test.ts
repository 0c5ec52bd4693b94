/**
 * Schema Audit Tests
 */

import { SchemaAuditService } from '../schema.audit';
import { FakeBrowserProvider } from '../../../../__tests__/helpers/mocks';

const ARTICLE_URL = 'https://blog.test/post';

const articleHtml = `
<html>
<head>
  <title>Launch notes</title>
  <script type="application/ld+json">{"@context": "https://schema.org", "@type": "Article"}</script>
</head>
<body>
  <article itemscope itemtype="https://schema.org/BlogPosting">
    <h1 itemprop="headline">Launch notes</h1>
  </article>
</body>
</html>
`;

describe('SchemaAuditService', () => {
  let browser: FakeBrowserProvider;
  let service: SchemaAuditService;

  beforeEach(() => {
    browser = new FakeBrowserProvider({
      [ARTICLE_URL]: { html: articleHtml },
      'https://blog.test/missing': { html: '<html></html>', status: 404 },
    });
    service = new SchemaAuditService(browser);
  });

  it('should report the structured data of a page', async () => {
    const result = await service.audit(ARTICLE_URL, { headless: false, timeoutSeconds: 15 });
    if (!result.ok) throw new Error(result.failure.error);

    expect(result.data.validation.schema_types).toEqual(['Article', 'BlogPosting']);
    expect(result.data.validation.by_type).toEqual({ 'json-ld': 1, microdata: 1, rdfa: 0 });
    expect(result.data.structured_data.microdata).toEqual([
      { type: 'microdata', itemtype: 'https://schema.org/BlogPosting', properties: { headline: 'Launch notes' } },
    ]);
    expect(result.data.audit_info).toMatchObject({
      url: ARTICLE_URL,
      page_title: 'Launch notes',
      total_structured_items: 2,
    });
    expect(browser.launches).toEqual([{ headless: false }]);
    expect(browser.navigations[0].options).toEqual({ timeoutMs: 15000 });
  });

  it('should fail on an error status', async () => {
    const result = await service.audit('https://blog.test/missing', { headless: true, timeoutSeconds: 30 });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failure.error).toBe('Failed to load page. HTTP status: 404');
    expect(result.failure.context).toEqual({
      audit_info: { url: 'https://blog.test/missing', audit_time: expect.any(Number) },
    });
  });

  it('should wrap navigation errors', async () => {
    const result = await service.audit('https://nowhere.test/', { headless: true, timeoutSeconds: 30 });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failure.error).toBe(
      'Schema audit failed: net::ERR_NAME_NOT_RESOLVED at https://nowhere.test/'
    );
  });
});
