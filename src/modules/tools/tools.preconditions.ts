/**
 * Shared precondition stage: URL shape and external capability checks
 */

import { INVALID_URL_MESSAGE, isValidHttpUrl } from '../../lib/crawling/url-normalizer';
import { Precondition } from './tools.types';

export const LIGHTHOUSE_MISSING_MESSAGE = 'Lighthouse CLI not found. Install with: npm install -g lighthouse';
export const YOUTUBE_KEY_MISSING_MESSAGE = 'YOUTUBE_API_KEY environment variable not set';

export const validUrl: Precondition<{ url: string }> = ({ url }) => (isValidHttpUrl(url) ? null : INVALID_URL_MESSAGE);

export const lighthouseInstalled: Precondition<unknown> = async (_args, { lighthouse }) => {
  const version = await lighthouse.version();
  if (version === null) {
    console.warn('audit_speed: Lighthouse CLI is not available');
    return LIGHTHOUSE_MISSING_MESSAGE;
  }
  return null;
};

export const youtubeKeyPresent: Precondition<unknown> = (_args, { youtubeApiKey }) =>
  youtubeApiKey ? null : YOUTUBE_KEY_MISSING_MESSAGE;
