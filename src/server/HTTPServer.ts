import express, { Request, Response, NextFunction } from 'express';
import type { AddressInfo } from 'net';
import type { ReconcileConfig } from '../common/Config';
import type { ILogger } from '../common/Logger';
import { StringLineSource } from '../streams/source/StringLineSource';
import { TextRecordStream } from '../streams/TextRecordStream';
import { UniqueStream } from '../streams/UniqueStream';
import { FoldedStream } from '../streams/FoldedStream';
import { MultiStream } from '../streams/MultiStream';
import { fieldsOf } from '../streams/StreamTypes';
import type { FieldValue, StreamRecord } from '../streams/StreamTypes';
import type { ISortedStream } from '../streams/ISortedStream';
import { Reporter } from '../report/Reporter';
import { InventoryReconciler } from '../reconcile/InventoryReconciler';

interface GroupResult {
  key: string;
  values: string[][];
}

class BadRequest extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BadRequest';
  }
}

function field(body: unknown, name: string): unknown {
  if (typeof body !== 'object' || body === null) {
    throw new BadRequest('Invalid request body: expected a JSON object');
  }
  return Object.getOwnPropertyDescriptor(body, name)?.value;
}

function textField(body: unknown, name: string): string {
  const value = field(body, name);
  if (typeof value !== 'string') {
    throw new BadRequest(`Invalid ${name}: must be a string of sorted records`);
  }
  return value;
}

function textListField(body: unknown, name: string): string[] {
  const value = field(body, name);
  if (!Array.isArray(value) || value.length === 0) {
    throw new BadRequest(`Invalid ${name}: must be a non-empty array of strings`);
  }
  const texts: string[] = [];
  for (let i = 0; i < value.length; i++) {
    const text: unknown = value[i];
    if (typeof text !== 'string') {
      throw new BadRequest(`Invalid ${name} at index ${i}: must be a string`);
    }
    texts.push(text);
  }
  return texts;
}

function flagField(body: unknown, name: string): boolean {
  const value = field(body, name);
  if (value === undefined) {
    return false;
  }
  if (typeof value !== 'boolean') {
    throw new BadRequest(`Invalid ${name}: must be a boolean`);
  }
  return value;
}

function textStream(text: string, label: string): TextRecordStream {
  return new TextRecordStream(new StringLineSource(text, label));
}

function toGroup(record: StreamRecord<string, FieldValue[]>): GroupResult {
  return { key: record.key, values: record.value.map(fieldsOf) };
}

export class HTTPServer {
  private readonly app: express.Application;
  private readonly config: ReconcileConfig;
  private readonly logger: ILogger;
  private server: ReturnType<express.Application['listen']> | null = null;

  constructor(config: ReconcileConfig, logger: ILogger) {
    this.config = config;
    this.logger = logger;
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandling();
  }

  private setupMiddleware(): void {
    this.app.use(express.json({ limit: '10mb' }));
  }

  private setupRoutes(): void {
    this.app.get('/health', (_req: Request, res: Response) => {
      res.json({ status: 'ok', timestamp: Date.now() });
    });

    this.app.post('/diff', this.handle('DIFF', this.handleDiff.bind(this)));

    this.app.post('/merge', this.handle('MERGE', this.handleMerge.bind(this)));

    this.app.post('/fold', this.handle('FOLD', this.handleFold.bind(this)));

    this.app.post('/unique', this.handle('UNIQUE', this.handleUnique.bind(this)));

    this.app.post('/reconcile', this.handle('RECONCILE', this.handleReconcile.bind(this)));
  }

  private setupErrorHandling(): void {
    this.app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
      if (err instanceof SyntaxError) {
        res.status(400).json({ error: 'Invalid JSON body' });
        return;
      }
      this.logger.error('HTTP: Unhandled error:', err);
      res.status(500).json({ error: 'Internal server error' });
    });
  }

  private handle(label: string, handler: (body: unknown) => unknown): (req: Request, res: Response) => void {
    return (req: Request, res: Response) => {
      try {
        const body: unknown = req.body;
        res.json(handler(body));
      } catch (err) {
        if (err instanceof BadRequest) {
          res.status(400).json({ error: err.message });
          return;
        }
        this.logger.error(`HTTP: ${label} error:`, err);
        res.status(500).json({ error: 'Internal server error' });
      }
    };
  }

  private handleDiff(body: unknown): unknown {
    let left: ISortedStream<string, FieldValue> = textStream(textField(body, 'left'), 'left');
    let right: ISortedStream<string, FieldValue> = textStream(textField(body, 'right'), 'right');

    if (flagField(body, 'unique') || this.config.uniqueInputs) {
      left = new UniqueStream(left);
      right = new UniqueStream(right);
    }

    const rows: Array<{ key: string; left: string[] | null; right: string[] | null }> = [];
    left.diffAgainst(right).each(row => {
      rows.push({
        key: row.key,
        left: row.left === null ? null : fieldsOf(row.left),
        right: row.right === null ? null : fieldsOf(row.right),
      });
    });

    return { count: rows.length, rows };
  }

  private handleMerge(body: unknown): unknown {
    const streams = textListField(body, 'sources').map((text, i) => textStream(text, `source ${i}`));
    const results: GroupResult[] = [];

    for (const record of MultiStream.merge(...streams).iterate()) {
      results.push(toGroup(record));
    }

    return { count: results.length, results };
  }

  private handleFold(body: unknown): unknown {
    const stream = new FoldedStream(textStream(textField(body, 'source'), 'source'));
    const results: GroupResult[] = [];

    for (const record of stream.iterate()) {
      results.push(toGroup(record));
    }

    return { count: results.length, results };
  }

  private handleUnique(body: unknown): unknown {
    const stream = new UniqueStream(textStream(textField(body, 'source'), 'source'));
    const results: Array<{ key: string; fields: string[] }> = [];

    stream.filteredIterate((key, value) => {
      results.push({ key, fields: fieldsOf(value) });
    });

    return { count: results.length, results };
  }

  private handleReconcile(body: unknown): unknown {
    const left = textStream(textField(body, 'left'), 'left');
    const right = textStream(textField(body, 'right'), 'right');
    const unique = flagField(body, 'unique') || this.config.uniqueInputs;

    const reporter = new Reporter('Reconcile', 'left vs right', {
      logger: this.logger,
      maxLines: this.config.reportMaxLines,
    });
    const summary = new InventoryReconciler(reporter).compare(left, right, { unique });

    return { summary, report: [...reporter.lines()] };
  }

  public getPort(): number | null {
    const address: AddressInfo | string | null = this.server ? this.server.address() : null;
    if (address === null || typeof address === 'string') {
      return null;
    }
    return address.port;
  }

  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server = this.app.listen(this.config.httpPort, () => {
        this.logger.info(`HTTP: server listening on port ${this.getPort() ?? this.config.httpPort}`);
        resolve();
      });

      this.server.on('error', (err: Error) => {
        reject(err);
      });
    });
  }

  async stop(): Promise<void> {
    return new Promise((resolve) => {
      if (this.server) {
        this.server.close(() => {
          this.logger.info('HTTP: server stopped');
          this.server = null;
          resolve();
        });
      } else {
        resolve();
      }
    });
  }
}
