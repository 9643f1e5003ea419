#!/usr/bin/env node

import { Command } from 'commander';
import path from 'path';
import type { HandlerResult } from '../shared/types/handover';
import { loadSettings } from './config/settingsStore';
import { getErrorCode } from './errors';
import type { ExchangeOutcome } from './exchange/NdefExchange';
import { HandoverService } from './handover/HandoverService';
import {
  createHandoverRequest,
  fromUserspaceUri,
  toUserspaceUri,
} from './handover/HandoverDetector';
import type { NdefMessage } from './ndef/NdefMessage';
import { NdefRecord, Tnf } from './ndef/NdefRecord';
import { createTextMessage, isUriRecord, parseRecordUri } from './ndef/uri';
import { initializeLogger, logger } from './utils/logger';
import { parsePort } from './utils/validation';

interface CommonOptions {
  config?: string;
  text?: string;
}

interface ListenOptions extends CommonOptions {
  port?: string;
}

const program = new Command();

function describeRecord(record: NdefRecord, index: number): string {
  if (isUriRecord(record)) {
    return `${index}: uri ${parseRecordUri(record)}`;
  }
  if (record.tnf === Tnf.MIME_MEDIA) {
    const mimeType = record.type.toString('ascii');
    const body = mimeType.startsWith('text/')
      ? record.payload.toString('utf-8')
      : `${record.payloadLength} bytes`;
    return `${index}: ${mimeType} ${body}`;
  }
  return `${index}: ${record.toString()}`;
}

function describeMessage(message: NdefMessage): string[] {
  return message.records.map(describeRecord);
}

function createService(options: CommonOptions): HandoverService {
  const settings = loadSettings({
    cwd: options.config ? path.resolve(options.config) : undefined,
  });
  initializeLogger(settings.logLevel);

  const service = new HandoverService(settings);
  service.setForegroundPayload(options.text ? createTextMessage(options.text) : null);
  service.addHandler({
    handleNdef: (message): HandlerResult => {
      logger.info('Received message', { records: describeMessage(message) });
      return 'consumed';
    },
  });
  return service;
}

async function handleListen(options: ListenOptions): Promise<void> {
  const service = createService(options);
  const listener = service.createTcpListener(
    options.port === undefined ? {} : { port: parsePort(options.port, 'port') }
  );
  listener.on('exchange', (outcome: ExchangeOutcome) => {
    logger.info('Exchange finished', {
      sent: outcome.sent,
      received: outcome.received ? describeMessage(outcome.received) : null,
    });
  });

  const port = await listener.start();
  logger.info(`Waiting for handover on port ${port}`);

  process.once('SIGINT', () => {
    void listener
      .stop()
      .catch((error: unknown) => {
        logger.error('Failed to stop listener', { error });
      })
      .finally(() => {
        process.exit(0);
      });
  });
}

async function handlePush(uris: string[], options: CommonOptions): Promise<void> {
  const service = createService(options);
  service.addTcpHandover();

  const result = await service.dispatch(createHandoverRequest(uris));
  if (result !== 'consumed') {
    logger.error('No candidate transport accepted the handover', { uris });
    process.exitCode = 1;
  }
}

function handleEncode(uris: string[]): void {
  process.stdout.write(`${toUserspaceUri(createHandoverRequest(uris))}\n`);
}

function handleDecode(uri: string): void {
  const message = fromUserspaceUri(uri);
  process.stdout.write(`${describeMessage(message).join('\n')}\n`);
}

program
  .name('ndef-handover')
  .description('Exchange NDEF messages over a negotiated connection')
  .version('1.0.0');

program
  .command('listen')
  .description('Accept TCP handovers and exchange messages with each peer')
  .option('-p, --port <port>', 'TCP port to listen on')
  .option('-t, --text <text>', 'Text message to send to every peer')
  .option('-c, --config <dir>', 'Settings directory')
  .action(async (options: ListenOptions) => {
    await handleListen(options);
  });

program
  .command('push <uris...>')
  .description('Negotiate a handover with the given candidate URIs')
  .option('-t, --text <text>', 'Text message to send')
  .option('-c, --config <dir>', 'Settings directory')
  .action(async (uris: string[], options: CommonOptions) => {
    await handlePush(uris, options);
  });

program
  .command('encode <uris...>')
  .description('Print the ndef://wkt:hr/ envelope of a handover request')
  .action((uris: string[]) => {
    handleEncode(uris);
  });

program
  .command('decode <uri>')
  .description('Print the records of an ndef://wkt:hr/ envelope')
  .action((uri: string) => {
    handleDecode(uri);
  });

void program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error('CLI command failed', { error, code: getErrorCode(error) });
  process.exit(1);
});
