import { jot, type JotSchema } from '../jot.js';
import type {
  Project,
  ProjectDeleteResult,
  ProjectUpdateResult,
  SearchResults,
  SessionDetail,
  SessionMetadata,
  SessionPage,
  SessionSummary,
  SessionWriteResult,
} from '../types/index.js';
import type { GraphQLErrorItem } from '../errors.js';

const optionalText = jot.optional(jot.nullable(jot.string()));
const optionalTextList = jot.optional(jot.nullable(jot.array(jot.string())));

export const projectNode: JotSchema<Project> = jot.object(
  {
    id: jot.string(),
    name: jot.string(),
    ownerId: jot.string(),
    icon: optionalText,
    color: optionalText,
    createdAt: jot.string(),
    updatedAt: jot.string(),
  },
  { passthrough: true },
);

export const projectListNode = jot.object({ projects: jot.array(projectNode) });

export const projectUpdateNode: JotSchema<ProjectUpdateResult> = jot.object(
  {
    name: jot.optional(jot.string()),
    icon: optionalText,
    color: optionalText,
  },
  { passthrough: true },
);

export const projectDeleteNode: JotSchema<ProjectDeleteResult> = jot.object({
  deletedProject: projectNode,
  deletedAt: jot.string(),
});

export const sessionMetadataNode: JotSchema<SessionMetadata> = jot.object(
  {
    clientName: optionalText,
    clientVersion: optionalText,
    agentName: optionalText,
    deviceId: optionalText,
    gitBranches: optionalTextList,
    llmModels: optionalTextList,
    tags: optionalTextList,
  },
  { passthrough: true },
);

const summaryShape = {
  id: jot.string(),
  projectId: jot.string(),
  name: jot.string(),
  createdAt: jot.string(),
  updatedAt: jot.string(),
  eventCount: jot.optional(jot.number()),
  markdownSize: jot.optional(jot.number()),
  rawDataSize: jot.optional(jot.number()),
};

export const sessionSummaryNode: JotSchema<SessionSummary> = jot.object(summaryShape, { passthrough: true });

export const sessionPageNode: JotSchema<SessionPage> = jot.object({
  sessions: jot.array(sessionSummaryNode),
  nextCursor: jot.optional(jot.nullable(jot.string())),
});

export const sessionDetailNode: JotSchema<SessionDetail> = jot.object(
  {
    ...summaryShape,
    projectName: jot.optional(jot.string()),
    markdown: jot.string(),
    rawData: jot.string(),
    events: jot.optional(
      jot.array(
        jot.object(
          { timestamp: jot.string(), type: jot.string(), data: jot.unknown() },
          { passthrough: true },
        ),
      ),
    ),
    metadata: jot.optional(sessionMetadataNode),
    startedAt: optionalText,
    endedAt: optionalText,
  },
  { passthrough: true },
);

export const sessionEnvelopeNode = jot.object({ session: sessionDetailNode });

export const sessionWriteNode: JotSchema<SessionWriteResult> = jot.object({
  sessionId: jot.string(),
  projectId: jot.string(),
  createdAt: jot.string(),
});

export const searchResultsNode: JotSchema<SearchResults> = jot.object({
  total: jot.number(),
  pageInfo: jot.optional(
    jot.object({
      hasNextPage: jot.boolean(),
      hasPreviousPage: jot.boolean(),
      startCursor: optionalText,
      endCursor: optionalText,
    }),
  ),
  results: jot.array(
    jot.object(
      {
        id: jot.string(),
        name: jot.string(),
        projectId: jot.string(),
        projectName: jot.optional(jot.string()),
        rank: jot.optional(jot.number()),
        highlights: jot.optional(jot.record(jot.array(jot.string()))),
        metadata: jot.optional(sessionMetadataNode),
      },
      { passthrough: true },
    ),
  ),
});

export const graphqlErrorNode: JotSchema<GraphQLErrorItem> = jot.object(
  {
    message: jot.string(),
    path: jot.optional(jot.array(jot.unknown())),
    extensions: jot.optional(jot.record(jot.unknown())),
  },
  { passthrough: true },
);

export const graphqlResponseNode = jot.object({
  data: jot.optional(jot.nullable(jot.record(jot.unknown()))),
  errors: jot.optional(jot.array(graphqlErrorNode)),
});

/** `{ success: true, data }` wrapper around every REST payload. */
export function envelope<T>(data: JotSchema<T>) {
  return jot.object({ success: jot.literal(true), data });
}
