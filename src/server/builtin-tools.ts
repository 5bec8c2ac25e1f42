import type { McpServer } from './server.js';
import { errorResult, textResult } from './server.js';

/** Register `echo` and `server_info`. */
export function registerBuiltinTools(server: McpServer): void {
  server.registerTool(
    'echo',
    'Return the given text unchanged. Useful for checking a connection end to end.',
    {
      type: 'object',
      properties: {
        text: { type: 'string', description: 'Text to echo back' },
      },
      required: ['text'],
    },
    async (args) => {
      const text = args['text'];
      if (typeof text !== 'string') {
        return errorResult('Error: "text" must be a string');
      }
      return textResult(text);
    },
  );

  server.registerTool(
    'server_info',
    'Describe this server: name, version and how many resources, tools and prompts it exposes.',
    { type: 'object', properties: {} },
    async () => {
      const info = server.getServerInfo();
      return textResult(JSON.stringify({
        name: info.name,
        version: info.version,
        resources: server.getResourceCount(),
        tools: server.getToolCount(),
        prompts: server.getPromptCount(),
      }));
    },
  );
}
