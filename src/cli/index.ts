#!/usr/bin/env node

import 'reflect-metadata';
import { Command } from 'commander';
import dotenv from 'dotenv';
import * as readline from 'readline';
import { ConfigurationError, loadConfig } from '../config/config';
import { ValidationFailedException } from '../exceptions';
import { ApiKey } from '../interfaces';
import { CliService, DatabaseUnavailableError, isDatabaseError, parseListLimit } from './cli-service';

dotenv.config();

const program = new Command();

program.name('api-keys').description('Manage API keys').version('0.1.0');

interface ConnectionOptions {
  dbUrl?: string;
}

function formatDate(date: Date | null): string {
  return date ? date.toISOString().replace('T', ' ').substring(0, 16) : 'never';
}

async function confirm(question: string): Promise<boolean> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  const answer = await new Promise<string>((resolve) => {
    rl.question(`${question} [y/N] `, (input: string) => {
      rl.close();
      resolve(input);
    });
  });
  return ['y', 'yes'].includes(answer.trim().toLowerCase());
}

function describeError(error: unknown): string {
  if (error instanceof ValidationFailedException) {
    return error.errors.map((fieldError) => `${fieldError.field}: ${fieldError.message}`).join('\n');
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Connects, runs `work` and disconnects. Exits with status 1 on failure.
 */
async function withCli(
  options: ConnectionOptions,
  work: (cli: CliService) => Promise<number | void>,
): Promise<void> {
  let cli: CliService | null = null;
  let exitCode = 0;

  try {
    const env = options.dbUrl ? { ...process.env, DATABASE_URL: options.dbUrl } : process.env;
    cli = new CliService(loadConfig(env));
    await cli.initialize();
    const code = await work(cli);
    exitCode = typeof code === 'number' ? code : 0;
  } catch (error) {
    exitCode = 1;
    if (isDatabaseError(error)) {
      console.error('Error: Unable to connect to database.');
      if (error instanceof DatabaseUnavailableError) {
        console.error(`Details: ${error.details}`);
      }
    } else if (error instanceof ConfigurationError) {
      console.error(`Error: ${error.problems.join('\n       ')}`);
    } else {
      console.error(`Error: ${describeError(error)}`);
    }
  } finally {
    await cli?.disconnect();
  }

  if (exitCode !== 0) {
    process.exit(exitCode);
  }
}

function printNotFound(prefixOrId: string): number {
  console.error(`No API key found with prefix/ID: ${prefixOrId}`);
  return 1;
}

program
  .command('create')
  .description('Create a new API key')
  .requiredOption('-n, --name <name>', 'Name for the API key')
  .requiredOption('-c, --client-id <clientId>', 'Client identifier')
  .option('-e, --expires <date>', 'Expiration date (ISO 8601)')
  .option('--db-url <url>', 'Database URL (or set DATABASE_URL env var)')
  .action(async (options: ConnectionOptions & { name: string; clientId: string; expires?: string }) => {
    await withCli(options, async (cli) => {
      const result = await cli.createKey({
        name: options.name,
        clientId: options.clientId,
        expiresAt: options.expires,
      });

      console.log('\nAPI key created successfully!\n');
      console.log(`Name: ${result.name}`);
      console.log(`Client ID: ${result.clientId}`);
      console.log(`Prefix: ${result.keyPrefix}`);
      if (result.expiresAt) {
        console.log(`Expires: ${result.expiresAt.toISOString()}`);
      }
      console.log('\nIMPORTANT: Save this key now - it will only be shown once!\n');
      console.log(result.key);
      console.log('');
    });
  });

program
  .command('list')
  .description('List API keys, newest first')
  .option('-l, --limit <number>', 'Maximum keys to show (1-100)', parseListLimit, 50)
  .option('--db-url <url>', 'Database URL (or set DATABASE_URL env var)')
  .action(async (options: ConnectionOptions & { limit: number }) => {
    await withCli(options, async (cli) => {
      const { keys, total } = await cli.listKeys(options.limit);
      if (keys.length === 0) {
        console.log('No API keys found.');
        return;
      }

      console.log(`\nAPI Keys (${total} total)\n`);
      keys.forEach((key) => {
        console.log(`${key.keyPrefix}  ${key.isActive ? 'active ' : 'revoked'}  ${key.name}`);
        console.log(`   Client ID: ${key.clientId}`);
        console.log(`   Last used: ${formatDate(key.lastUsedAt)}`);
        console.log(`   Created: ${formatDate(key.createdAt)}`);
      });
      console.log('');
    });
  });

program
  .command('revoke')
  .description('Revoke an API key')
  .argument('<prefix-or-id>', 'Key prefix or ID to revoke')
  .option('-f, --force', 'Skip confirmation prompt')
  .option('--db-url <url>', 'Database URL (or set DATABASE_URL env var)')
  .action(async (prefixOrId: string, options: ConnectionOptions & { force?: boolean }) => {
    await withCli(options, async (cli) => {
      const key = await cli.resolveKey(prefixOrId);
      if (!key) {
        return printNotFound(prefixOrId);
      }

      if (!key.isActive) {
        console.log(`Key '${key.name}' is already revoked.`);
        return;
      }

      if (!options.force) {
        console.log(`Key to revoke: ${key.name} (${key.keyPrefix})`);
        if (!(await confirm('Are you sure you want to revoke this key?'))) {
          console.log('Cancelled.');
          return;
        }
      }

      const outcome = await cli.revokeKey(key);
      if (outcome === 'failed') {
        console.error('Failed to revoke key.');
        return 1;
      }
      console.log(`Successfully revoked key '${key.name}' (${key.keyPrefix})`);
    });
  });

program
  .command('info')
  .description('Show detailed information about an API key')
  .argument('<prefix-or-id>', 'Key prefix or ID to show')
  .option('--db-url <url>', 'Database URL (or set DATABASE_URL env var)')
  .action(async (prefixOrId: string, options: ConnectionOptions) => {
    await withCli(options, async (cli) => {
      const key: ApiKey | null = await cli.resolveKey(prefixOrId);
      if (!key) {
        return printNotFound(prefixOrId);
      }

      console.log('\nAPI Key Details');
      console.log('-'.repeat(40));
      console.log(`ID: ${key.id}`);
      console.log(`Name: ${key.name}`);
      console.log(`Client ID: ${key.clientId}`);
      console.log(`Prefix: ${key.keyPrefix}`);
      console.log(`Status: ${key.isActive ? 'Active' : 'Revoked'}`);
      console.log(`Created: ${key.createdAt.toISOString()}`);
      console.log(`Last Used: ${key.lastUsedAt ? key.lastUsedAt.toISOString() : 'Never'}`);
      if (key.expiresAt) {
        console.log(`Expires: ${key.expiresAt.toISOString()}`);
      }
      if (key.revokedAt) {
        console.log(`Revoked At: ${key.revokedAt.toISOString()}`);
      }
      console.log('');
    });
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(`Error: ${describeError(error)}`);
  process.exit(1);
});
