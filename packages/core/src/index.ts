// Errors
export * from './errors';

// Config
export * from './config/schema';
export * from './config/loader';

// Planner
export * from './planner/constants';
export * from './planner/ignore-policy';
export * from './planner/rule-matcher';

// Agents
export * from './agents/bounded-queue';
export * from './agents/reply-slot';
export * from './agents/rate-limiter';
export * from './agents/file-context';
export * from './agents/prompts/suggestion-prompt';
export * from './agents/llm-client';
export * from './agents/suggestion-worker';

// Indexer
export * from './indexer/watcher';

// Organizer
export * from './organizer/mover';
export * from './organizer/dispatcher';
export * from './organizer/pipeline';
