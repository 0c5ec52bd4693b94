import { RegisteredTool } from '../tools.types';
import { instagramTools } from './instagram.tools';
import { seoTools } from './seo.tools';
import { siteTools } from './site.tools';
import { youtubeTools } from './youtube.tools';

export const allTools: RegisteredTool[] = [...siteTools, ...seoTools, ...instagramTools, ...youtubeTools];
