#!/usr/bin/env node

/**
 * jwt-codec CLI
 *
 * Commands:
 * - jwt-codec sign: Sign a JSON payload into a token
 * - jwt-codec verify: Verify a token and print its contents
 * - jwt-codec inspect: Decode a token without verification
 * - jwt-codec algorithms: List algorithms available with the configured keys
 */

import { Command } from 'commander';
import chalk from 'chalk';
import * as fs from 'fs';
import * as readline from 'readline';

import { JWT, JWTError, KeyStore, SUPPORTED_ALGORITHMS, VERSION } from '../index';
import type { DecodedToken } from '../index';
import { ConfigError, createKeyStore, errorMessage, resolveConfig } from './config';
import type { KeyOptions } from './config';

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Print styled output
 */
const print = {
  success: (msg: string) => console.log(chalk.green('✓'), msg),
  error: (msg: string) => console.error(chalk.red('✗'), msg),
  warn: (msg: string) => console.log(chalk.yellow('⚠'), msg),
  header: (msg: string) => console.log(chalk.bold.cyan('\n' + msg)),
  json: (obj: unknown) => console.log(JSON.stringify(obj, null, 2)),
};

/**
 * Print an error and exit
 */
function fail(err: unknown): never {
  if (err instanceof JWTError) {
    print.error(`${err.message} ${chalk.dim(`(${err.errorKey}, ${err.errorCode})`)}`);
  } else if (err instanceof ConfigError) {
    print.error(err.message);
  } else {
    print.error(`Unexpected error: ${errorMessage(err)}`);
  }
  process.exit(1);
}

/**
 * Read all of stdin
 */
async function readStdin(): Promise<string> {
  const rl = readline.createInterface({
    input: process.stdin,
    terminal: false,
  });

  let data = '';
  for await (const line of rl) {
    data += line + '\n';
  }
  return data.trim();
}

/**
 * Token argument: a literal token, or a path to a file holding one
 */
function readToken(token: string): string {
  if (fs.existsSync(token)) {
    return fs.readFileSync(token, 'utf8').trim();
  }
  return token.trim();
}

/**
 * Payload argument: inline JSON, a path to a JSON file, or stdin when omitted or `-`
 */
async function readPayload(payload?: string): Promise<unknown> {
  let text: string;
  if (payload === undefined || payload === '-') {
    text = await readStdin();
  } else if (fs.existsSync(payload)) {
    text = fs.readFileSync(payload, 'utf8');
  } else {
    text = payload;
  }

  try {
    return JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Payload is not valid JSON: ${errorMessage(err)}`, { cause: err });
  }
}

function createCodec(options: KeyOptions): { jwt: JWT; algorithm: string } {
  const config = resolveConfig(options);
  if (config.source) {
    // stderr, so a signed token on stdout stays pipeable
    console.error(chalk.dim(`Using config ${config.source}`));
  }
  return { jwt: new JWT(createKeyStore(config)), algorithm: config.algorithm };
}

function printDecoded(decoded: DecodedToken): void {
  console.log(chalk.bold('\nHeader:'));
  for (const [key, value] of Object.entries(decoded.header)) {
    console.log(`  ${chalk.dim(key + ':')} ${chalk.cyan(JSON.stringify(value))}`);
  }

  console.log(chalk.bold('\nPayload:'));
  for (const [key, value] of Object.entries(decoded.payload)) {
    console.log(`  ${chalk.dim(key + ':')} ${JSON.stringify(value)}`);
  }

  console.log(chalk.bold('\nSignature:'));
  console.log(`  ${chalk.dim(decoded.signature)}`);
}

// ============================================================================
// COMMANDS
// ============================================================================

/**
 * sign command - Sign a JSON payload
 */
async function signCommand(payloadArg: string | undefined, options: KeyOptions) {
  try {
    const payload = await readPayload(payloadArg);
    if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
      throw new ConfigError('Payload must be a JSON object');
    }

    const { jwt, algorithm } = createCodec(options);
    const entries: Array<[string, unknown]> = Object.entries(payload);
    console.log(jwt.encode(Object.fromEntries(entries), algorithm));
  } catch (err) {
    fail(err);
  }
}

/**
 * verify command - Verify a token
 */
function verifyCommand(token: string, options: KeyOptions & { json?: boolean }) {
  try {
    const { jwt } = createCodec(options);
    const decoded = jwt.decodeComplete(readToken(token));

    if (options.json) {
      print.json({ valid: true, header: decoded.header, payload: decoded.payload });
      return;
    }

    print.success(chalk.green.bold('Signature is VALID'));
    printDecoded(decoded);
  } catch (err) {
    if (options.json && err instanceof JWTError) {
      print.json({ valid: false, error: err.toJSON() });
      process.exit(1);
    }
    fail(err);
  }
}

/**
 * inspect command - Decode without verification
 */
function inspectCommand(token: string, options: { json?: boolean }) {
  try {
    // no keys needed: nothing gets verified
    const jwt = new JWT(new KeyStore());
    const decoded = jwt.decodeComplete(readToken(token), true);

    if (options.json) {
      print.json({ header: decoded.header, payload: decoded.payload });
      return;
    }

    print.header('Token Details');
    print.warn('Signature NOT verified');
    printDecoded(decoded);
  } catch (err) {
    fail(err);
  }
}

/**
 * algorithms command - Show what the configured keys can do
 */
function algorithmsCommand(options: KeyOptions) {
  try {
    const { jwt } = createCodec(options);
    const unavailable = jwt.registry.unavailable();

    print.header('Algorithms');
    for (const algorithm of SUPPORTED_ALGORITHMS) {
      const reason = unavailable.get(algorithm);
      if (reason) {
        console.log(`  ${chalk.red('✗')} ${algorithm} ${chalk.dim(reason.message)}`);
      } else {
        console.log(`  ${chalk.green('✓')} ${algorithm}`);
      }
    }
  } catch (err) {
    fail(err);
  }
}

// ============================================================================
// CLI PROGRAM
// ============================================================================

function withKeyOptions(command: Command): Command {
  return command
    .option('-c, --config <file>', 'Config file (default: ./jwt-codec.config.json if present)')
    .option('-s, --secret <secret>', 'Shared secret for HS* algorithms (or JWT_SECRET)')
    .option('--private-key <file>', 'Private key PEM for signing (or JWT_PRIVATE_KEY_PATH)')
    .option('--public-key <file>', 'Public key PEM for verification (or JWT_PUBLIC_KEY_PATH)');
}

const program = new Command();

program
  .name('jwt-codec')
  .description(chalk.cyan('Sign, verify and inspect compact header.payload.signature tokens'))
  .version(VERSION, '-v, --version')
  .addHelpText('after', `
${chalk.bold('Examples:')}
  ${chalk.dim('# Sign a payload with a shared secret')}
  $ jwt-codec sign '{"sub":"alice"}' --secret test-secret

  ${chalk.dim('# Sign with RS256')}
  $ jwt-codec sign payload.json -a RS256 --private-key signing-key.pem

  ${chalk.dim('# Verify a token')}
  $ JWT_SECRET=test-secret jwt-codec verify eyJ0eXAiOiJKV1Qi...

  ${chalk.dim('# Inspect a token without verifying it')}
  $ jwt-codec inspect token.jwt --json
`);

withKeyOptions(
  program
    .command('sign [payload]')
    .description('Sign a JSON payload (inline, file, or stdin)')
    .option('-a, --algorithm <alg>', `Algorithm (${SUPPORTED_ALGORITHMS.join(', ')})`)
).action(signCommand);

withKeyOptions(
  program
    .command('verify <token>')
    .description('Verify a token signature and print its contents')
    .option('-j, --json', 'Output as JSON')
).action(verifyCommand);

program
  .command('inspect <token>')
  .description('Decode a token WITHOUT verifying its signature')
  .option('-j, --json', 'Output as JSON')
  .action(inspectCommand);

withKeyOptions(
  program
    .command('algorithms')
    .description('List algorithms available with the configured keys')
).action(algorithmsCommand);

program.parseAsync().catch(fail);
