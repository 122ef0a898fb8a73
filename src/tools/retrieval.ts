import { z } from 'zod';
import { tool } from '@langchain/core/tools';
import type { RunnableConfig } from '@langchain/core/runnables';
import type * as t from '@/types';
import { ToolNames } from '@/common/enum';

/** A compiled RAG graph, or anything else that answers `{ question }` with `{ response }` */
export interface RagAnswerer {
  invoke(
    input: { question: string },
    config?: RunnableConfig
  ): Promise<Pick<t.RagState, 'response'>>;
}

export function createRetrieveInformationTool(
  ragGraph: RagAnswerer
): t.GenericTool {
  return tool(
    async ({ query }, config) => {
      const result = await ragGraph.invoke({ question: query }, config);
      return result.response;
    },
    {
      name: ToolNames.RETRIEVE_INFORMATION,
      description:
        'Use Retrieval Augmented Generation to retrieve information about student loan policies',
      schema: z.object({
        query: z.string().describe('query to ask the retrieve information tool'),
      }),
    }
  );
}
