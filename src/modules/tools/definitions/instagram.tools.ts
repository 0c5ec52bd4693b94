/**
 * Instagram profile tools (public profile pages only)
 */

import { z } from 'zod';
import { InstagramService, MAX_COMPARED_PROFILES, MAX_POSTS } from '../../social/instagram/instagram.service';
import { cappedCountArg, countParam } from '../tools.params';
import { defineTool } from '../tools.registry';
import { JsonSchemaProperty } from '../tools.types';

const MAX_SAMPLE_SIZE = 12;

const usernameArg = z.string().min(1);
const usernameParam: JsonSchemaProperty = {
  type: 'string',
  description: 'Instagram username, @handle or profile URL',
};
const usernameSchema = z.object({ username: usernameArg });
const usernameParameters = {
  type: 'object' as const,
  properties: { username: usernameParam },
  required: ['username'],
};

export const instagramTools = [
  defineTool({
    definition: {
      name: 'get_profile_info',
      description: 'Public Instagram profile facts: counts, bio, verification, privacy and follower ratio.',
      parameters: usernameParameters,
    },
    schema: usernameSchema,
    handler: (args, { browser }) => new InstagramService(browser).getProfileInfo(args.username),
  }),
  defineTool({
    definition: {
      name: 'get_social_posts',
      description: 'Recent posts from a public Instagram profile with their image alt text.',
      parameters: {
        type: 'object',
        properties: {
          username: usernameParam,
          limit: countParam('Number of recent posts to fetch', 12, MAX_POSTS),
        },
        required: ['username'],
      },
    },
    schema: usernameSchema.extend({ limit: cappedCountArg(12, MAX_POSTS) }),
    handler: (args, { browser }) => new InstagramService(browser).getSocialPosts(args.username, args.limit),
  }),
  defineTool({
    definition: {
      name: 'analyze_engagement_score',
      description: 'Estimate engagement quality from profile counts and a sample of recent posts.',
      parameters: {
        type: 'object',
        properties: {
          username: usernameParam,
          sample_size: countParam('Number of recent posts to analyze', 6, MAX_SAMPLE_SIZE),
        },
        required: ['username'],
      },
    },
    schema: usernameSchema.extend({ sample_size: cappedCountArg(6, MAX_SAMPLE_SIZE) }),
    handler: (args, { browser }) => new InstagramService(browser).analyzeEngagementScore(args.username, args.sample_size),
  }),
  defineTool({
    definition: {
      name: 'get_hashtag_analysis',
      description: 'Hashtags used in the profile bio with a bio optimization score.',
      parameters: usernameParameters,
    },
    schema: usernameSchema,
    handler: (args, { browser }) => new InstagramService(browser).getHashtagAnalysis(args.username),
  }),
  defineTool({
    definition: {
      name: 'compare_instagram_profiles',
      description: 'Compare up to five public Instagram profiles side by side.',
      parameters: {
        type: 'object',
        properties: {
          usernames: {
            type: 'array',
            description: 'Usernames or profile URLs to compare',
            items: { type: 'string' },
            maxItems: MAX_COMPARED_PROFILES,
          },
        },
        required: ['usernames'],
      },
    },
    schema: z.object({ usernames: z.array(usernameArg).min(1) }),
    handler: (args, { browser }) => new InstagramService(browser).compareProfiles(args.usernames),
  }),
];
