import { z } from 'zod';
import { INVALID_URL_MESSAGE } from '../../../lib/crawling/url-normalizer';
import { fail, succeed } from '../../../lib/tools/tool-result';
import {
  createTestToolContext,
  FakeBrowserProvider,
  FakeHttpClient,
  FakeLighthouseRunner,
} from '../../../__tests__/helpers/mocks';
import { BREW_ID, createYouTubeApi } from '../../social/youtube/__tests__/youtube.fixtures';
import { allTools } from '../definitions';
import { cappedCountArg } from '../tools.params';
import { LIGHTHOUSE_MISSING_MESSAGE, YOUTUBE_KEY_MISSING_MESSAGE } from '../tools.preconditions';
import { defineTool, ToolRegistry } from '../tools.registry';

const echoTool = defineTool({
  definition: {
    name: 'echo_count',
    description: 'Echo a capped count',
    parameters: { type: 'object', properties: {}, required: [] },
  },
  schema: z.object({ count: cappedCountArg(6, 12) }),
  handler: async (args) => succeed(args.count),
});

const throwingTool = defineTool({
  definition: {
    name: 'always_throws',
    description: 'Throws from its handler',
    parameters: { type: 'object', properties: {}, required: [] },
  },
  schema: z.object({}),
  handler: async () => {
    throw new Error('boom');
  },
});

describe('ToolRegistry', () => {
  it('advertises every tool once', () => {
    const registry = new ToolRegistry(createTestToolContext(), allTools);
    const names = registry.list().map((tool) => tool.name);

    expect(names).toHaveLength(24);
    expect(new Set(names).size).toBe(24);
    expect(names).toEqual(
      expect.arrayContaining([
        'crawl_site',
        'audit_speed',
        'check_schema',
        'check_external_links',
        'audit_accessibility',
        'check_robots_txt',
        'check_https_usage',
        'check_internal_linking',
        'quick_seo_audit',
        'compare_instagram_profiles',
        'get_video_seo_score',
      ])
    );
  });

  it('rejects duplicate names', () => {
    expect(() => new ToolRegistry(createTestToolContext(), [echoTool, echoTool])).toThrow(
      'Duplicate tool name: echo_count'
    );
  });

  it('reports unknown tools', async () => {
    const registry = new ToolRegistry(createTestToolContext(), allTools);

    await expect(registry.invoke('nope', {})).resolves.toEqual(fail('Unknown tool: nope'));
  });

  describe('argument validation', () => {
    it('rejects arguments of the wrong type before any I/O', async () => {
      const http = new FakeHttpClient();
      const registry = new ToolRegistry(createTestToolContext({ http }), allTools);

      const result = await registry.invoke('check_robots_txt', { url: 5 });

      expect(result).toEqual(fail('Invalid arguments: url: Expected string, received number'));
      expect(http.requests).toHaveLength(0);
    });

    it('reports missing required arguments', async () => {
      const registry = new ToolRegistry(createTestToolContext(), allTools);

      await expect(registry.invoke('check_schema', {})).resolves.toEqual(fail('Invalid arguments: url: Required'));
    });

    it('rejects a zero timeout that the parameters also exclude', async () => {
      const registry = new ToolRegistry(createTestToolContext(), allTools);
      const robots = registry.list().find((tool) => tool.name === 'check_robots_txt');

      expect(robots?.parameters.properties.timeout).toEqual({
        type: 'number',
        description: 'Request timeout in seconds',
        default: 10,
        exclusiveMinimum: 0,
      });
      await expect(registry.invoke('check_robots_txt', { url: 'https://site.test/', timeout: 0 })).resolves.toEqual(
        fail('Invalid arguments: timeout: Number must be greater than 0')
      );
    });

    it('applies defaults and caps', async () => {
      const registry = new ToolRegistry(createTestToolContext(), [echoTool]);

      await expect(registry.invoke('echo_count', {})).resolves.toEqual(succeed(6));
      await expect(registry.invoke('echo_count', { count: 40 })).resolves.toEqual(succeed(12));
      await expect(registry.invoke('echo_count', undefined)).resolves.toEqual(succeed(6));
    });
  });

  describe('preconditions', () => {
    it('rejects URLs without an http scheme', async () => {
      const browser = new FakeBrowserProvider();
      const registry = new ToolRegistry(createTestToolContext({ browser }), allTools);

      await expect(registry.invoke('crawl_site', { url: 'ftp://site.test/' })).resolves.toEqual(fail(INVALID_URL_MESSAGE));
      await expect(registry.invoke('get_page_info', { url: 'site.test' })).resolves.toEqual(fail(INVALID_URL_MESSAGE));
      expect(browser.launches).toHaveLength(0);
    });

    it('requires the Lighthouse CLI for speed audits', async () => {
      const lighthouse = new FakeLighthouseRunner(null, new Error('unused'));
      const registry = new ToolRegistry(createTestToolContext({ lighthouse }), allTools);

      const result = await registry.invoke('audit_speed', { url: 'https://site.test/' });

      expect(result).toEqual(fail(LIGHTHOUSE_MISSING_MESSAGE));
      expect(lighthouse.runs).toHaveLength(0);
    });

    it('requires a YouTube API key', async () => {
      const registry = new ToolRegistry(createTestToolContext(), allTools);

      await expect(registry.invoke('get_channel_stats', { channel: BREW_ID })).resolves.toEqual(
        fail(YOUTUBE_KEY_MISSING_MESSAGE)
      );
    });
  });

  it('runs tools against the injected capabilities', async () => {
    const http = new FakeHttpClient({ 'https://site.test/robots.txt': { status: 404 } });
    const registry = new ToolRegistry(createTestToolContext({ http }), allTools);

    const result = await registry.invoke('check_robots_txt', { url: 'https://site.test/blog' });

    expect(http.requests).toEqual([{ url: 'https://site.test/robots.txt', options: { timeoutMs: 10000 } }]);
    expect(result.ok && result.data).toMatchObject({ robots_txt_status: { found: false, accessible: true } });
  });

  it('builds YouTube tools from the configured key', async () => {
    const api = createYouTubeApi();
    const registry = new ToolRegistry(createTestToolContext({ http: api, youtubeApiKey: 'test-key' }), allTools);

    const result = await registry.invoke('get_channel_stats', { channel: BREW_ID });

    expect(result.ok && result.data).toMatchObject({ channel_id: BREW_ID, days_active: 730 });
    expect(api.calls('channels')[0].get('key')).toBe('test-key');
  });

  it('turns handler exceptions into failures', async () => {
    const registry = new ToolRegistry(createTestToolContext(), [throwingTool]);

    await expect(registry.invoke('always_throws', {})).resolves.toEqual(fail('always_throws failed: boom'));
  });
});
