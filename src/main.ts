#!/usr/bin/env node
import 'reflect-metadata';
import { Logger, LogLevel } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { Command, InvalidArgumentError } from 'commander';
import inquirer from 'inquirer';
import { AppModule } from './app.module';
import { AppError } from './common/errors/app.error';
import { AnalysisService } from './modules/analysis/analysis.service';

type CliOptions = {
  password?: string;
  online: boolean;
  timeout?: number;
  count: number;
  verbose: boolean;
};

const LOG_LEVELS: LogLevel[] = ['error', 'warn', 'log', 'debug', 'verbose'];

function logLevelsUpTo(level: string): LogLevel[] {
  const index = LOG_LEVELS.findIndex((candidate) => candidate === level);
  return LOG_LEVELS.slice(0, index === -1 ? 2 : index + 1);
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

async function readPassword(provided?: string): Promise<string> {
  if (provided !== undefined) return provided;
  if (process.stdin.isTTY) {
    const { password } = await inquirer.prompt<{ password: string }>([
      {
        type: 'password',
        name: 'password',
        message: 'Password to analyze',
        mask: '*',
      },
    ]);
    return password;
  }
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8').replace(/\r?\n$/, '');
}

async function analyze(options: CliOptions): Promise<void> {
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: logLevelsUpTo('warn'),
  });
  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once('SIGINT', onInterrupt);

  try {
    const configService = app.get(ConfigService);
    app.useLogger(
      logLevelsUpTo(
        options.verbose
          ? 'debug'
          : configService.getOrThrow<string>('app.logLevel'),
      ),
    );

    const password = await readPassword(options.password);
    const analysisService = app.get(AnalysisService);
    const result = await analysisService.analyze({
      password,
      enableOnline: options.online,
      timeoutMs: options.timeout,
      suggestionCount: options.count,
      signal: controller.signal,
    });
    process.stdout.write(
      `${JSON.stringify(analysisService.toReport(result), null, 2)}\n`,
    );
  } finally {
    process.removeListener('SIGINT', onInterrupt);
    await app.close();
  }
}

const program = new Command();
program
  .name('password-risk')
  .description(
    'Score password risk, check breach corpora and suggest stronger replacements',
  )
  .version('1.0.0')
  .option(
    '-p, --password <value>',
    'password to analyze (prompted when omitted; avoid on shared systems)',
  )
  .option(
    '-o, --online',
    'also query the online breach database with a k-anonymity range lookup',
    false,
  )
  .option(
    '-t, --timeout <ms>',
    'online lookup timeout in milliseconds',
    parsePositiveInt,
  )
  .option('-c, --count <n>', 'number of suggestions', parsePositiveInt, 3)
  .option('-v, --verbose', 'enable debug logging', false)
  .action(async () => {
    await analyze(program.opts<CliOptions>());
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  if (error instanceof AppError) {
    process.stderr.write(`${error.code}: ${error.message}\n`);
  } else {
    new Logger('Cli').error(
      `Analysis failed: ${(error as Error).message}`,
      (error as Error).stack,
    );
  }
  process.exitCode = 1;
});
