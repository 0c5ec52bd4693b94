/**
 * Production capabilities for the tools
 */

import { env } from '../../config/env';
import { browserProvider } from '../../lib/browser';
import { httpClient } from '../../lib/http/fetch.client';
import { lighthouseRunner } from '../../lib/lighthouse/cli.runner';
import { certificateInspector } from '../../lib/tls/node-tls.inspector';
import { sleep } from '../../lib/utils/async';
import { ToolContext } from './tools.types';

export function createToolContext(): ToolContext {
  return {
    browser: browserProvider,
    http: httpClient,
    certificates: certificateInspector,
    lighthouse: lighthouseRunner,
    sleep,
    now: () => new Date(),
    youtubeApiKey: env.YOUTUBE_API_KEY,
  };
}
