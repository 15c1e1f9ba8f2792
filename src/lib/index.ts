export * from "./flow";
export * from "./llm";
export { loadConfig, buildLLMService, type AppConfig } from "./config";
export { createAssistant, type AssistantOverrides } from "./assistant";
export { default as logger, createSessionLogger, type Logger } from "./logger";
