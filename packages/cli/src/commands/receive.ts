import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import {
  DEFAULT_RECEIVER_HOST,
  DEFAULT_RECEIVER_PORT,
  getLogger,
  receiverConfigSchema,
} from '@hostpulse/shared';
import { ReceiverServer } from '@hostpulse/receiver';

const logger = getLogger();

export const receiveCommand = new Command('receive')
  .option('-p, --port <port>', 'Port to listen on', String(DEFAULT_RECEIVER_PORT))
  .option('-H, --host <host>', 'Address to bind', DEFAULT_RECEIVER_HOST)
  .description('Run a development receiver that accepts agent samples')
  .action(async (flags: { port: string; host: string }) => {
    const parsed = receiverConfigSchema.safeParse({ host: flags.host, port: Number(flags.port) });
    if (!parsed.success) {
      console.error(chalk.red(`\n  Invalid receiver options: ${parsed.error.issues[0]?.message}\n`));
      process.exitCode = 1;
      return;
    }

    const server = new ReceiverServer(parsed.data);
    const spinner = ora('Starting receiver...').start();

    try {
      await server.start();
    } catch (err) {
      spinner.fail(`Failed to start receiver: ${err instanceof Error ? err.message : String(err)}`);
      process.exitCode = 1;
      return;
    }

    spinner.succeed(`Receiver listening at ${chalk.cyan(server.getAddress())}`);
    console.log(chalk.gray(`  POST ${server.getAddress()}/api/system-update`));
    console.log(chalk.gray(`  GET  ${server.getAddress()}/api/system-info-enhanced\n`));

    const onSignal = (signal: NodeJS.Signals): void => {
      logger.info({ signal }, 'Shutting down receiver');
      server
        .stop()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error({ err }, 'Receiver shutdown failed');
          process.exit(1);
        });
    };

    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);
  });
