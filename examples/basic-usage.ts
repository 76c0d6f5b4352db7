// Basic usage example: one prompt, standard and streaming, against a local backend
// Usage: npx tsx examples/basic-usage.ts [ollama|lmstudio|mlx_vlm]

import { config } from 'dotenv';
import { ConsoleLogger, createBackend, formatTimingInfo, isBackendError } from '../src/index.js';

config();

async function main() {
  const type = process.argv[2] ?? process.env.BACKEND_TYPE ?? 'ollama';
  console.log(`Backend usage example (${type})\n`);

  const backend = createBackend({
    type,
    model: process.env.BACKEND_MODEL,
    logger: new ConsoleLogger('example', 'warn'),
  });

  try {
    // Simple completion
    console.log('1. Standard completion...');
    const answer = await backend.generate('What is 2 + 2? Answer with just the number.');
    console.log(`   ✓ Response: ${answer.text.trim()}\n`);

    // System prompt and options
    console.log('2. Completion with system prompt...');
    const joke = await backend.generate(
      'Tell me a joke about programming.',
      'You are a funny assistant who tells short jokes.',
      { temperature: 0.7, maxTokens: 100 },
    );
    console.log(`   ✓ Response: ${joke.text.trim()}\n`);

    // Streaming: chunks arrive as they are generated
    console.log('3. Streaming completion...');
    process.stdout.write('   ');
    const streamed = await backend.generateStreaming('Name three primary colours.', undefined, undefined, (chunk) => {
      process.stdout.write(chunk);
    });
    console.log('\n');
    console.log(formatTimingInfo(streamed));
  } catch (error: unknown) {
    if (isBackendError(error)) {
      console.log(`   ✗ ${error.name}: ${error.message}\n`);
    } else {
      throw error;
    }
  } finally {
    backend.close();
  }
}

main().catch(console.error);
