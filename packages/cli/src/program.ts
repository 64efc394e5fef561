import { Command } from 'commander';
import { EntitlementsClient, isCancellation } from '@entitlements-sdk/client';
import { isEntitlementsError } from '@entitlements-sdk/shared';
import { printError, printInfo, printLines, printSuccess, printWarning } from './banner';
import { formatConsumption, formatEntitlementsSet } from './format';

export const EXIT_FAILURE = 1;
export const EXIT_CANCELLED = 130;

export type GlobalOptions = {
  verbose?: boolean;
};

export type ClientFactory = (options: GlobalOptions) => EntitlementsClient;

type Action = (client: EntitlementsClient, signal: AbortSignal) => Promise<void>;

export function createProgram(version: string, createClient: ClientFactory): Command {
  const program = new Command();

  program
    .name('entitlements')
    .description('Query and consume entitlements for the signed in user')
    .version(version, '-v, --version', 'Display version number')
    .option('--verbose', 'Log each request');

  const getClient = () => createClient(program.opts<GlobalOptions>());
  const run = (action: Action) => () => runAction(getClient, action);

  program
    .command('get')
    .description('Show the entitlements set of the user (deprecated, use consumption)')
    .action(
      run(async (client, signal) => {
        printWarning('get is deprecated, use consumption instead');
        const set = await client.getEntitlements({ signal });
        if (set) {
          printLines(formatEntitlementsSet(set));
        } else {
          printInfo('No entitlements');
        }
      }),
    );

  program
    .command('consumption')
    .description('Show entitlements and their consumption')
    .action(
      run(async (client, signal) => {
        printLines(formatConsumption(await client.getEntitlementsConsumption({ signal })));
      }),
    );

  program
    .command('external-id')
    .description('Show the external ID of the user')
    .action(
      run(async (client, signal) => {
        printLines([await client.getExternalId({ signal })]);
      }),
    );

  program
    .command('redeem')
    .description('Redeem entitlements from the claims of the identity token')
    .action(
      run(async (client, signal) => {
        const set = await client.redeemEntitlements({ signal });
        printSuccess(`Redeemed ${set.name}`);
        printLines(formatEntitlementsSet(set));
      }),
    );

  program
    .command('consume')
    .description('Consume one unit of each named boolean entitlement')
    .argument('<names...>', 'entitlement names')
    .action((names: string[]) =>
      runAction(getClient, async (client, signal) => {
        await client.consumeBooleanEntitlements(names, { signal });
        printSuccess(`Consumed ${names.join(', ')}`);
      }),
    );

  return program;
}

/**
 * Run one command, cancelling it on SIGINT. Failures set the exit code
 * instead of throwing.
 */
export async function runAction(getClient: () => EntitlementsClient, action: Action): Promise<void> {
  const controller = new AbortController();
  const onSigint = () => controller.abort();
  process.once('SIGINT', onSigint);

  try {
    await action(getClient(), controller.signal);
  } catch (error) {
    if (isCancellation(error)) {
      printError('Cancelled');
      process.exitCode = EXIT_CANCELLED;
    } else if (isEntitlementsError(error)) {
      printError(`${error.kind}: ${error.message}`);
      process.exitCode = EXIT_FAILURE;
    } else {
      printError(error instanceof Error ? error.message : String(error));
      process.exitCode = EXIT_FAILURE;
    }
  } finally {
    process.off('SIGINT', onSigint);
  }
}
