export { OpenAIChatClient } from "./OpenAIChatClient.js";
export type { OpenAIChatClientConfig } from "./OpenAIChatClient.js";
export { OpenAIEmbeddingProvider } from "./OpenAIEmbeddingProvider.js";
export type { OpenAIEmbeddingProviderConfig } from "./OpenAIEmbeddingProvider.js";
