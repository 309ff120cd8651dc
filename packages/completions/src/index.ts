export type { ICompletionClient, CompletionOptions } from "./completion-client.interface.js";
export { CohereCompletionClient } from "./cohere-completion-client.js";
export type {
  CohereCompletionConfig,
  CohereChatFn,
  CohereChatRequest,
  CohereChatResponse,
  CohereChatOptions,
} from "./cohere-completion-client.js";
export { createCompletionClient } from "./factory.js";
export type { CompletionFactoryConfig } from "./factory.js";
