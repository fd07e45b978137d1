#!/usr/bin/env node
// CLI interface for the Data Commons agent
import 'dotenv/config';
import * as readline from 'node:readline';
import { createChatProvider } from '@datcom/core';
import { SharedResources } from '@datcom/server';
import { loadConfig } from '@datcom/shared';
import { DataCommonsAgent } from './agent.js';
import {
  type CLIOptions,
  CLIUsageError,
  HELP_TEXT,
  parseCliArgs,
} from './cli-options.js';
import { inProcessServer, MCPClient } from './mcp-client.js';
import { AGENT_DESCRIPTION, AGENT_NAME } from './prompts.js';

function runInteractive(
  agent: DataCommonsAgent,
  mcpClient: MCPClient,
  verbose: boolean,
): Promise<void> {
  return new Promise((resolve) => {
    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
    });

    console.log(`\n🤖 ${AGENT_NAME}`);
    console.log(AGENT_DESCRIPTION);
    console.log(
      'Type your question, or use commands: tools, verbose, help, exit\n',
    );

    let isVerbose = verbose;

    rl.on('close', () => resolve());

    const handleLine = async (input: string): Promise<boolean> => {
      const trimmed = input.trim();
      if (!trimmed) return true;

      // Commands work with or without a leading slash
      const command = (
        trimmed.startsWith('/') ? trimmed.slice(1) : trimmed
      ).toLowerCase();

      switch (command) {
        case 'tools': {
          const tools = mcpClient.getTools();
          console.log(`\nAvailable tools (${tools.length}):`);
          for (const tool of tools) {
            console.log(
              `  - ${tool.name}: ${tool.description || '(no description)'}`,
            );
          }
          console.log('');
          return true;
        }
        case 'verbose':
          isVerbose = !isVerbose;
          console.log(`Verbose mode: ${isVerbose ? 'ON' : 'OFF'}\n`);
          return true;
        case 'help':
          console.log('\nCommands:');
          console.log('  tools              - List available MCP tools');
          console.log('  verbose            - Toggle verbose reasoning output');
          console.log('  exit               - Exit the agent\n');
          return true;
        case 'exit':
        case 'quit':
          console.log('Goodbye!');
          return false;
      }

      try {
        agent.setVerbose(isVerbose);
        const result = await agent.run(trimmed);

        if (!isVerbose) {
          console.log(`\n${result.answer}\n`);
        }
        console.log(
          `[Tools used: ${result.toolsUsed.join(', ') || 'none'} | Steps: ${result.totalSteps}]\n`,
        );
      } catch (error) {
        console.error(
          `Error: ${error instanceof Error ? error.message : String(error)}\n`,
        );
      }
      return true;
    };

    const prompt = (): void => {
      rl.question('> ', (input) => {
        handleLine(input)
          .then((keepGoing) => {
            if (keepGoing) {
              prompt();
            } else {
              rl.close();
            }
          })
          .catch((error: unknown) => {
            console.error('Unexpected error:', error);
            rl.close();
          });
      });
    };

    prompt();
  });
}

async function main(): Promise<void> {
  const config = loadConfig();

  let options: CLIOptions;
  try {
    options = parseCliArgs(process.argv.slice(2), config);
  } catch (error) {
    if (error instanceof CLIUsageError) {
      console.error(`Error: ${error.message}`);
      console.error('Run with --help for usage.');
      process.exit(2);
    }
    throw error;
  }

  if (options.help) {
    console.log(HELP_TEXT);
    return;
  }

  if (!options.query && !options.interactive) {
    console.log(
      '\nNo query provided. Use -q for single query or -i for interactive mode.',
    );
    console.log(HELP_TEXT);
    return;
  }

  if (!options.apiKey) {
    console.error('Error: OpenAI API key is required');
    console.error('Set OPENAI_API_KEY environment variable or use --api-key');
    process.exit(1);
  }

  const chat = createChatProvider({
    ...config.llm,
    model: options.model,
    apiKey: options.apiKey,
  });

  const mcpClient = new MCPClient(
    options.serverUrl
      ? { mode: 'http', baseUrl: options.serverUrl }
      : inProcessServer(new SharedResources(config)),
  );

  try {
    await mcpClient.connect();
    console.log(
      `Connected to ${options.serverUrl ?? 'in-process tools'}: ${mcpClient.getTools().length} tools available.`,
    );
  } catch (error) {
    const errorMsg = error instanceof Error ? error.message : String(error);
    console.error(`Failed to connect to MCP server: ${errorMsg}`);
    if (
      errorMsg.includes('ECONNREFUSED') ||
      errorMsg.includes('fetch failed')
    ) {
      console.error('\nMake sure the datcom server is running:');
      console.error('  npm run server');
    }
    process.exit(1);
  }

  const agent = new DataCommonsAgent(chat, mcpClient, {
    maxSteps: options.maxSteps,
    verbose: options.verbose,
    maxTokens: config.llm.maxTokens,
    temperature: config.agent.temperature,
  });

  try {
    if (options.query) {
      const result = await agent.run(options.query);

      if (!options.verbose) {
        console.log(`\nAnswer: ${result.answer}`);
      }

      console.log(`\nTools used: ${result.toolsUsed.join(', ') || 'none'}`);
      console.log(`Total steps: ${result.totalSteps}`);
      console.log(`Success: ${result.success}`);
    } else {
      await runInteractive(agent, mcpClient, options.verbose);
    }
  } finally {
    await mcpClient.disconnect();
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
