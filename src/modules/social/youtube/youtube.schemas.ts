/**
 * YouTube Data API v3 response schemas
 * Only the fields the tools read; counts arrive as strings
 */

import { z } from 'zod';

const thumbnailsSchema = z.record(z.object({ url: z.string() })).default({});

const countSchema = z.string().optional();

export const channelIdListSchema = z.object({
  items: z.array(z.object({ id: z.string() })).default([]),
});

export const channelListSchema = z.object({
  items: z
    .array(
      z.object({
        id: z.string(),
        snippet: z.object({
          title: z.string(),
          description: z.string().default(''),
          publishedAt: z.string(),
          country: z.string().optional(),
          customUrl: z.string().optional(),
          thumbnails: thumbnailsSchema,
        }),
        statistics: z
          .object({
            viewCount: countSchema,
            subscriberCount: countSchema,
            videoCount: countSchema,
            hiddenSubscriberCount: z.boolean().optional(),
          })
          .default({}),
      })
    )
    .default([]),
});

export const searchListSchema = z.object({
  items: z
    .array(
      z.object({
        id: z.object({ videoId: z.string() }),
        snippet: z.object({
          title: z.string(),
          description: z.string().default(''),
          publishedAt: z.string(),
          thumbnails: thumbnailsSchema,
        }),
      })
    )
    .default([]),
});

const videoStatisticsSchema = z
  .object({
    viewCount: countSchema,
    likeCount: countSchema,
    commentCount: countSchema,
  })
  .default({});

export const videoListSchema = z.object({
  items: z
    .array(
      z.object({
        id: z.string(),
        snippet: z.object({
          title: z.string(),
          description: z.string().default(''),
          publishedAt: z.string(),
          tags: z.array(z.string()).default([]),
          categoryId: z.string().optional(),
          thumbnails: thumbnailsSchema,
        }),
        statistics: videoStatisticsSchema,
        contentDetails: z.object({ duration: z.string().optional() }).default({}),
      })
    )
    .default([]),
});

export const videoStatsListSchema = z.object({
  items: z.array(z.object({ id: z.string(), statistics: videoStatisticsSchema })).default([]),
});

export type ChannelResource = z.infer<typeof channelListSchema>['items'][number];
export type SearchResult = z.infer<typeof searchListSchema>['items'][number];
export type VideoResource = z.infer<typeof videoListSchema>['items'][number];
export type VideoStatistics = z.infer<typeof videoStatisticsSchema>;
