// src/tools/search.ts
import { z } from 'zod';
import { tool } from '@langchain/core/tools';
import { TavilySearchResults } from '@langchain/community/tools/tavily_search';
import type * as t from '@/types';
import { Constants, ToolNames } from '@/common/enum';
import { isPresent } from '@/utils/misc';

export type SearchToolParams = {
  apiKey?: string;
  maxResults?: number;
};

/**
 * Web search for the research team.
 * Without an API key the tool stays registered but answers with a sentinel,
 * so the graph shape does not depend on configuration.
 */
export function createSearchTool({
  apiKey,
  maxResults = 5,
}: SearchToolParams = {}): t.GenericTool {
  if (isPresent(apiKey)) {
    return new TavilySearchResults({ apiKey, maxResults });
  }
  return tool(async () => Constants.SEARCH_UNAVAILABLE, {
    name: ToolNames.WEB_SEARCH,
    description:
      'A search engine optimized for comprehensive, accurate, and trusted results. Useful for when you need to answer questions about current events. Input should be a search query.',
    schema: z.object({
      input: z.string().describe('Search query to look up'),
    }),
  });
}
