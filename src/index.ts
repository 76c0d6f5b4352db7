// LLM backend bridge - one client API over Ollama, LM Studio and MLX-VLM
// Main entry point and exports

export * from './core/index.js';
