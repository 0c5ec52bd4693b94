/**
 * YouTube channel and video tools over the Data API
 */

import { z } from 'zod';
import { YouTubeClient } from '../../social/youtube/youtube.client';
import { MAX_COMPARED_CHANNELS, MAX_SEARCH_RESULTS, YouTubeService } from '../../social/youtube/youtube.service';
import { cappedCountArg, countArg, countParam } from '../tools.params';
import { YOUTUBE_KEY_MISSING_MESSAGE, youtubeKeyPresent } from '../tools.preconditions';
import { defineTool } from '../tools.registry';
import { JsonSchemaProperty, ToolContext } from '../tools.types';

function youtube({ youtubeApiKey, http, now }: ToolContext): YouTubeService {
  if (!youtubeApiKey) {
    throw new Error(YOUTUBE_KEY_MISSING_MESSAGE);
  }
  return new YouTubeService(new YouTubeClient(youtubeApiKey, http), now);
}

const channelParam: JsonSchemaProperty = {
  type: 'string',
  description: 'Channel id, channel URL, or handle',
};
const videoParam: JsonSchemaProperty = {
  type: 'string',
  description: 'Video id or YouTube video URL',
};

const channelSchema = z.object({ channel: z.string().min(1) });
const videoSchema = z.object({ video: z.string().min(1) });

const channelParameters = { type: 'object' as const, properties: { channel: channelParam }, required: ['channel'] };
const videoParameters = { type: 'object' as const, properties: { video: videoParam }, required: ['video'] };

export const youtubeTools = [
  defineTool({
    definition: {
      name: 'get_channel_stats',
      description: 'Channel statistics and metadata: subscribers, views, uploads and activity.',
      parameters: channelParameters,
    },
    schema: channelSchema,
    preconditions: [youtubeKeyPresent],
    handler: (args, context) => youtube(context).getChannelStats(args.channel),
  }),
  defineTool({
    definition: {
      name: 'get_recent_videos',
      description: 'Most recent uploads of a channel.',
      parameters: {
        type: 'object',
        properties: {
          channel: channelParam,
          max_results: countParam('Number of videos to fetch', 10, MAX_SEARCH_RESULTS),
        },
        required: ['channel'],
      },
    },
    schema: channelSchema.extend({ max_results: cappedCountArg(10, MAX_SEARCH_RESULTS) }),
    preconditions: [youtubeKeyPresent],
    handler: (args, context) => youtube(context).getRecentVideos(args.channel, args.max_results),
  }),
  defineTool({
    definition: {
      name: 'evaluate_video_metadata',
      description: 'Analyze a video title, description, tags, duration and engagement for SEO.',
      parameters: videoParameters,
    },
    schema: videoSchema,
    preconditions: [youtubeKeyPresent],
    handler: (args, context) => youtube(context).evaluateVideoMetadata(args.video),
  }),
  defineTool({
    definition: {
      name: 'analyze_channel_performance',
      description: 'Views, engagement and upload frequency for videos published in a recent period.',
      parameters: {
        type: 'object',
        properties: {
          channel: channelParam,
          days_back: countParam('Number of days to analyze', 30),
        },
        required: ['channel'],
      },
    },
    schema: channelSchema.extend({ days_back: countArg(30) }),
    preconditions: [youtubeKeyPresent],
    handler: (args, context) => youtube(context).analyzeChannelPerformance(args.channel, args.days_back),
  }),
  defineTool({
    definition: {
      name: 'get_video_seo_score',
      description: 'Score a video from 0 to 100 on title, description, tags, engagement, duration and thumbnail.',
      parameters: videoParameters,
    },
    schema: videoSchema,
    preconditions: [youtubeKeyPresent],
    handler: (args, context) => youtube(context).getVideoSeoScore(args.video),
  }),
  defineTool({
    definition: {
      name: 'compare_channels',
      description: 'Compare up to five channels side by side.',
      parameters: {
        type: 'object',
        properties: {
          channels: {
            type: 'array',
            description: 'Channel ids, URLs or handles to compare',
            items: { type: 'string' },
            maxItems: MAX_COMPARED_CHANNELS,
          },
        },
        required: ['channels'],
      },
    },
    schema: z.object({ channels: z.array(z.string().min(1)).min(1) }),
    preconditions: [youtubeKeyPresent],
    handler: (args, context) => youtube(context).compareChannels(args.channels),
  }),
];
