#!/usr/bin/env node
/**
 * Terminal front end for the stock simulator
 *
 * Ticks the session on its interval, reads one command per line and prints
 * what the core reports. Ctrl+C or `quit` saves and exits.
 */

import * as readline from 'readline';
import { createLogger, loadEnvFromRoot, type TradeResult } from '@stocksim/shared';
import { StateStore, TradingSession, createSeededNormal, loadConfig } from '@stocksim/simulator';
import { HELP_TEXT, parseCommand } from './commands.js';
import { c, formatChart, formatMoney, formatStatus } from './format.js';

async function main(): Promise<void> {
  const env = loadEnvFromRoot();
  const config = loadConfig();

  const logger = createLogger({
    service: 'stocksim',
    level: config.logLevel,
    file: config.logToFile,
  });

  if (env.path) {
    logger.info('Loaded environment file', { file: env.path, variables: env.variables });
  } else {
    logger.debug('No .env file found');
  }

  const session = TradingSession.open({
    store: new StateStore({ filePath: config.stateFile, logger: logger.child({ component: 'store' }) }),
    drift: config.drift,
    volatility: config.volatility,
    timeStep: config.timeStep,
    normal: config.seed !== undefined ? createSeededNormal(config.seed) : undefined,
    tickIntervalMs: config.tickIntervalMs,
    logger: logger.child({ component: 'session' }),
  });

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  rl.setPrompt(`${c.bold('stocksim')}> `);

  const say = (text: string): void => {
    readline.clearLine(process.stdout, 0);
    readline.cursorTo(process.stdout, 0);
    console.log(text);
    rl.prompt(true);
  };

  const status = (): string =>
    formatStatus(session.getSnapshot(), session.getCurrentPrice(), session.getValue());

  const report = (result: TradeResult): void => {
    if (result.ok) {
      const { side, quantity, price } = result.trade;
      say(c.success(`${side === 'buy' ? 'Bought' : 'Sold'} ${quantity} @ ${formatMoney(price)}`) + `  ${status()}`);
    } else {
      say(c.error(result.error.message));
    }
  };

  let previous = session.getCurrentPrice();
  session.on('price', (price, timeIndex) => {
    const move = price > previous ? c.success('▲') : price < previous ? c.error('▼') : c.dim('•');
    previous = price;
    say(`${c.dim(`#${timeIndex}`)} ${move} ${formatMoney(price)}`);
  });

  session.on('persistence:warning', (error) => {
    say(c.warning(`Could not save portfolio: ${error.message}`));
  });

  let closing = false;
  const close = async (): Promise<void> => {
    if (closing) return;
    closing = true;

    session.shutdown();
    rl.close();
    console.log(`\n${status()}`);
    await logger.close();
  };

  rl.on('line', (line) => {
    const command = parseCommand(line);

    switch (command.kind) {
      case 'buy':
        report(session.buy(command.quantity));
        break;
      case 'sell':
        report(session.sell(command.quantity));
        break;
      case 'status':
        say(status());
        break;
      case 'chart':
        say(formatChart(session.getTimeline()));
        break;
      case 'help':
        say(HELP_TEXT);
        break;
      case 'quit':
        close().catch((error: unknown) => logger.error('Shutdown failed', { error: String(error) }));
        break;
      case 'empty':
        rl.prompt();
        break;
      case 'unknown':
        say(c.warning(`Unknown command "${command.input}" (try help)`));
        break;
    }
  });

  rl.on('SIGINT', () => {
    close().catch((error: unknown) => logger.error('Shutdown failed', { error: String(error) }));
  });

  // stdin closed (piped input ran out)
  rl.on('close', () => {
    close().catch((error: unknown) => logger.error('Shutdown failed', { error: String(error) }));
  });

  console.log(c.bold('\nStock Market Simulator'));
  console.log(status());
  console.log(c.dim('Type "help" for commands.\n'));

  session.start();
  rl.prompt();
}

main().catch((error: unknown) => {
  console.error(c.error(error instanceof Error ? error.message : String(error)));
  process.exitCode = 1;
});
