export const TOOL_NAMES = [
  'shell',
  'read_file',
  'write_file',
  'edit_file',
  'patch_file',
  'save_memory',
  'recall_memory',
  'restart_self',
  'web_search',
  'web_fetch'
] as const;

export type ToolName = typeof TOOL_NAMES[number];

export function isToolName(value: string): value is ToolName {
  return TOOL_NAMES.some(name => name === value);
}

type JsonSchemaProperty = {
  type: 'string' | 'integer' | 'array' | 'object';
  description?: string;
  items?: JsonSchemaProperty;
  properties?: Record<string, JsonSchemaProperty>;
  required?: string[];
};

export type ToolDefinition = {
  type: 'function';
  function: {
    name: ToolName;
    description: string;
    parameters: {
      type: 'object';
      properties: Record<string, JsonSchemaProperty>;
      required: string[];
    };
  };
};

function defineTool(
  name: ToolName,
  description: string,
  properties: Record<string, JsonSchemaProperty> = {},
  required: string[] = []
): ToolDefinition {
  return {
    type: 'function',
    function: {
      name,
      description,
      parameters: { type: 'object', properties, required }
    }
  };
}

export const TOOL_DEFINITIONS: readonly ToolDefinition[] = [
  defineTool(
    'shell',
    'Run a bash command in the workspace and return stdout+stderr.',
    {
      cmd: { type: 'string' },
      timeout: { type: 'integer', description: 'Timeout in seconds (default 30)' }
    },
    ['cmd']
  ),
  defineTool(
    'read_file',
    'Read a text file. Relative paths resolve against the workspace.',
    { path: { type: 'string' } },
    ['path']
  ),
  defineTool(
    'write_file',
    'Write content to a file, creating parent directories as needed.',
    { path: { type: 'string' }, content: { type: 'string' } },
    ['path', 'content']
  ),
  defineTool(
    'edit_file',
    'Replace one exact occurrence of `old` with `new` in a file. `old` must match exactly once.',
    {
      path: { type: 'string' },
      old: { type: 'string', description: 'Exact text to replace (must be unique in file)' },
      new: { type: 'string', description: 'Replacement text' }
    },
    ['path', 'old', 'new']
  ),
  defineTool(
    'patch_file',
    'Apply several exact replacements to a file. Each `old` must match exactly once; nothing is written unless every patch applies.',
    {
      path: { type: 'string' },
      patches: {
        type: 'array',
        items: {
          type: 'object',
          properties: {
            old: { type: 'string' },
            new: { type: 'string' }
          },
          required: ['old', 'new']
        }
      }
    },
    ['path', 'patches']
  ),
  defineTool(
    'save_memory',
    'Persist important facts to long-term memory.',
    { content: { type: 'string' } },
    ['content']
  ),
  defineTool('recall_memory', 'Read current long-term memory.'),
  defineTool(
    'restart_self',
    'Restart the bot by re-executing the current process. Call this after modifying the bot\'s own source code.'
  ),
  defineTool(
    'web_search',
    'Search the web using Brave Search. Returns titles, URLs and snippets.',
    {
      query: { type: 'string' },
      count: { type: 'integer', description: 'Number of results (1-10, default 5)' }
    },
    ['query']
  ),
  defineTool(
    'web_fetch',
    'Fetch a URL and return its readable text content.',
    {
      url: { type: 'string' },
      max_chars: { type: 'integer', description: 'Max chars to return (default 8000)' }
    },
    ['url']
  )
];
