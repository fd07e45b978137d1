// Command-line option parsing for the agent CLI
import type { DatcomConfig } from '@datcom/shared';

export interface CLIOptions {
  /** Remote MCP server; the tools run in-process when unset */
  serverUrl?: string;
  model: string;
  apiKey: string;
  maxSteps: number;
  verbose: boolean;
  interactive: boolean;
  help: boolean;
  query?: string;
}

export class CLIUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CLIUsageError';
  }
}

/**
 * Parse CLI arguments on top of the loaded configuration
 * @throws {CLIUsageError} on an unknown flag or a bad value
 */
export function parseCliArgs(
  args: readonly string[],
  config: DatcomConfig,
  env: NodeJS.ProcessEnv = process.env,
): CLIOptions {
  const options: CLIOptions = {
    serverUrl: env.DATCOM_SERVER_URL || undefined,
    model: config.llm.model,
    apiKey: config.llm.apiKey ?? '',
    maxSteps: config.agent.maxSteps,
    verbose: false,
    interactive: false,
    help: false,
  };

  const value = (index: number, flag: string): string => {
    const next = args[index];
    if (next === undefined || next.startsWith('-')) {
      throw new CLIUsageError(`Missing value for ${flag}`);
    }
    return next;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--server':
      case '-s':
        options.serverUrl = value(++i, arg);
        break;
      case '--model':
      case '-m':
        options.model = value(++i, arg);
        break;
      case '--api-key':
      case '-k':
        options.apiKey = value(++i, arg);
        break;
      case '--max-steps': {
        const steps = Number.parseInt(value(++i, arg), 10);
        if (Number.isNaN(steps) || steps < 1) {
          throw new CLIUsageError('--max-steps must be a positive integer');
        }
        options.maxSteps = steps;
        break;
      }
      case '--verbose':
      case '-v':
        options.verbose = true;
        break;
      case '--interactive':
      case '-i':
        options.interactive = true;
        break;
      case '--query':
      case '-q':
        options.query = value(++i, arg);
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      default:
        throw new CLIUsageError(`Unknown option: ${arg}`);
    }
  }

  return options;
}

export const HELP_TEXT = `
datcom-agent - ask questions about places using Data Commons

Usage: npm run agent -- [options]

Options:
  -s, --server <url>      Remote MCP server URL (default: run the tools in-process)
  -m, --model <model>     OpenAI model to use (default: $LLM_MODEL or gpt-4o-mini)
  -k, --api-key <key>     OpenAI API key (or set OPENAI_API_KEY env var)
  --max-steps <n>         Maximum reasoning steps (default: $AGENT_MAX_STEPS or 10)
  -v, --verbose           Show detailed reasoning steps
  -i, --interactive       Interactive mode (REPL)
  -q, --query <query>     Run a single query and exit
  -h, --help              Show this help message

Environment Variables:
  DATCOM_API_KEY          Data Commons API key (in-process tools)
  DATCOM_SERVER_URL       Remote MCP server URL
  OPENAI_API_KEY          OpenAI API key
  LLM_MODEL               OpenAI model

Interactive Commands:
  tools                   List available MCP tools
  verbose                 Toggle verbose reasoning output
  help                    Show these commands
  exit                    Exit the agent

Examples:
  npm run agent -- -q "What is the population of California?"
  npm run agent -- -i -v
  npm run agent -- -s http://localhost:3000 -q "How many people lived in Kenya in 2015?"
`;
