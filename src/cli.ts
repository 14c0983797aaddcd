#!/usr/bin/env node
/**
 * Command-line transport.
 *
 *   bi-provisioner '<json payload>'
 *
 * Prints the response object as indented JSON on stdout. Log records go to
 * stderr so the output stays parseable.
 *
 * Exit codes:
 *   0 — provisioning completed
 *   1 — validation, configuration or provisioning failure
 */

import { Command, CommanderError } from 'commander';
import { Env, createRemoteClient, loadConfig } from './config';
import { isProvisionResult } from './domain/result';
import { toErrorResponse } from './engine/reporter';
import { ProvisionHandler, createProvisionHandler } from './handler';
import { setLogHandler, setLogLevel, toLogRecord } from './logger';
import { VERSION } from './server';

export interface CliDeps {
  /** Built from the environment when omitted. */
  handler?: ProvisionHandler;
  env?: Env;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
}

function buildHandler(env: Env | undefined): ProvisionHandler {
  const config = loadConfig(env);
  setLogLevel(config.logLevel);
  return createProvisionHandler({ client: createRemoteClient(config), config });
}

/** Run the CLI against `argv` (arguments after the program name). Resolves to the exit code. */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const stdout = deps.stdout ?? ((text: string) => process.stdout.write(text));
  const stderr = deps.stderr ?? ((text: string) => process.stderr.write(text));
  const print = (value: unknown) => stdout(`${JSON.stringify(value, null, 2)}\n`);

  let payload: string | undefined;
  const program = new Command()
    .name('bi-provisioner')
    .description('Provision a project into the BI platform: group, access mapping, folder and dashboards')
    .version(VERSION)
    .argument('<payload>', 'provision request as a JSON object')
    .exitOverride()
    .configureOutput({ writeOut: stdout, writeErr: stderr })
    .action((arg: string) => {
      payload = arg;
    });

  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode === 0 ? 0 : 1;
    }
    throw err;
  }
  if (payload === undefined) return 1;

  let handler: ProvisionHandler;
  try {
    handler = deps.handler ?? buildHandler(deps.env);
  } catch (err) {
    print(toErrorResponse(err));
    return 1;
  }

  const response = await handler(payload);
  print(response);
  return isProvisionResult(response) ? 0 : 1;
}

if (require.main === module) {
  setLogHandler((entry) => console.error(JSON.stringify(toLogRecord(entry))));
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(err instanceof Error ? err.message : String(err));
      process.exitCode = 1;
    },
  );
}
