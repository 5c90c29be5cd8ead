import express, { Request, Response, NextFunction } from 'express';
import {
  ConfigurationError,
  DuplicateSketchError,
  UnknownSketchError,
} from '../common/Errors';
import { ISketchRegistry, FilterOptions, SizedFilterOptions } from '../interfaces/Sketch';
import { SketchRegistry } from '../registry/SketchRegistry';
import { checkPasswordUniqueness } from '../analysis';
import {
  Parsed,
  parseArray,
  parseFilterShape,
  parseName,
  parseOptionalNumber,
  parseStringArray,
} from './RequestParsing';

/**
 * HTTP status for a failed sketch operation, or null for an unexpected error.
 */
export function errorStatus(err: unknown): 400 | 404 | 409 | null {
  if (err instanceof ConfigurationError) return 400;
  if (err instanceof UnknownSketchError) return 404;
  if (err instanceof DuplicateSketchError) return 409;
  return null;
}

export class HTTPServer {
  private readonly app: express.Application;
  private readonly registry: ISketchRegistry;
  private readonly port: number;
  private server: ReturnType<express.Application['listen']> | null = null;

  constructor(registry: ISketchRegistry, port: number) {
    this.registry = registry;
    this.port = port;
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

    this.app.get('/filters', (_req: Request, res: Response) => {
      res.json({ filters: this.registry.listFilters() });
    });
    this.app.post('/filters', this.handleCreateFilter.bind(this));
    this.app.get('/filters/:name', this.handleGetFilter.bind(this));
    this.app.delete('/filters/:name', this.handleDeleteFilter.bind(this));
    this.app.post('/filters/:name/add', this.handleFilterAdd.bind(this));
    this.app.post('/filters/:name/check', this.handleFilterCheck.bind(this));
    this.app.post('/filters/:name/passwords', this.handlePasswords.bind(this));

    this.app.get('/estimators', (_req: Request, res: Response) => {
      res.json({ estimators: this.registry.listEstimators() });
    });
    this.app.post('/estimators', this.handleCreateEstimator.bind(this));
    this.app.get('/estimators/:name', this.handleGetEstimator.bind(this));
    this.app.delete('/estimators/:name', this.handleDeleteEstimator.bind(this));
    this.app.post('/estimators/:name/add', this.handleEstimatorAdd.bind(this));
  }

  private setupErrorHandling(): void {
    this.app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
      console.error('Unhandled error:', err);
      res.status(500).json({ error: 'Internal server error' });
    });
  }

  /**
   * Create a filter.
   *
   * Request body formats:
   * 1. Explicit size: { "name": "f", "capacity": 1000, "hashCount": 3 }
   * 2. Sized for a target rate: { "name": "f", "expectedItems": 100, "falsePositiveRate": 0.01 }
   */
  private handleCreateFilter(req: Request, res: Response): void {
    try {
      const name = this.requireBody(res, parseName(req.body));
      if (name === undefined) return;
      const shape = this.requireBody(res, parseFilterShape(req.body));
      if (!shape) return;

      const options: FilterOptions | SizedFilterOptions = shape.kind === 'sized'
        ? { expectedItems: shape.expectedItems, falsePositiveRate: shape.falsePositiveRate }
        : {
          ...(shape.capacity !== undefined && { capacity: shape.capacity }),
          ...(shape.hashCount !== undefined && { hashCount: shape.hashCount }),
        };

      const filter = this.registry.createFilter(name, options);
      res.status(201).json({ name, ...filter.getStats() });
    } catch (err) {
      this.handleError(res, 'CREATE FILTER', err);
    }
  }

  private handleGetFilter(req: Request, res: Response): void {
    try {
      const filter = this.registry.getFilter(req.params.name ?? '');
      res.json({ name: req.params.name, ...filter.getStats() });
    } catch (err) {
      this.handleError(res, 'GET FILTER', err);
    }
  }

  private handleDeleteFilter(req: Request, res: Response): void {
    try {
      this.registry.deleteFilter(req.params.name ?? '');
      res.json({ success: true });
    } catch (err) {
      this.handleError(res, 'DELETE FILTER', err);
    }
  }

  private handleFilterAdd(req: Request, res: Response): void {
    try {
      const values = this.requireBody(res, parseStringArray(req.body, 'values'));
      if (!values) return;

      const filter = this.registry.getFilter(req.params.name ?? '');
      for (const value of values) {
        filter.add(value);
      }
      res.json({ success: true, count: values.length });
    } catch (err) {
      this.handleError(res, 'FILTER ADD', err);
    }
  }

  private handleFilterCheck(req: Request, res: Response): void {
    try {
      const values = this.requireBody(res, parseStringArray(req.body, 'values'));
      if (!values) return;

      const filter = this.registry.getFilter(req.params.name ?? '');
      const results = values.map((value) => ({ value, present: filter.check(value) }));
      res.json({ count: results.length, results });
    } catch (err) {
      this.handleError(res, 'FILTER CHECK', err);
    }
  }

  private handlePasswords(req: Request, res: Response): void {
    try {
      const passwords = this.requireBody(res, parseArray(req.body, 'passwords'));
      if (!passwords) return;

      const filter = this.registry.getFilter(req.params.name ?? '');
      const results = checkPasswordUniqueness(filter, passwords);
      res.json({ count: results.length, results });
    } catch (err) {
      this.handleError(res, 'PASSWORDS', err);
    }
  }

  private handleCreateEstimator(req: Request, res: Response): void {
    try {
      const name = this.requireBody(res, parseName(req.body));
      if (name === undefined) return;
      const bucketBits = parseOptionalNumber(req.body, 'bucketBits');
      if (!bucketBits.ok) {
        res.status(400).json({ error: bucketBits.error });
        return;
      }

      const estimator = this.registry.createEstimator(
        name,
        bucketBits.value !== undefined ? { bucketBits: bucketBits.value } : {}
      );
      res.status(201).json(SketchRegistry.summarize(name, estimator));
    } catch (err) {
      this.handleError(res, 'CREATE ESTIMATOR', err);
    }
  }

  private handleGetEstimator(req: Request, res: Response): void {
    try {
      const name = req.params.name ?? '';
      res.json(SketchRegistry.summarize(name, this.registry.getEstimator(name)));
    } catch (err) {
      this.handleError(res, 'GET ESTIMATOR', err);
    }
  }

  private handleDeleteEstimator(req: Request, res: Response): void {
    try {
      this.registry.deleteEstimator(req.params.name ?? '');
      res.json({ success: true });
    } catch (err) {
      this.handleError(res, 'DELETE ESTIMATOR', err);
    }
  }

  private handleEstimatorAdd(req: Request, res: Response): void {
    try {
      const values = this.requireBody(res, parseStringArray(req.body, 'values'));
      if (!values) return;

      const estimator = this.registry.getEstimator(req.params.name ?? '');
      for (const value of values) {
        estimator.add(value);
      }
      res.json({ success: true, count: values.length, estimate: estimator.estimate() });
    } catch (err) {
      this.handleError(res, 'ESTIMATOR ADD', err);
    }
  }

  private requireBody<T>(res: Response, parsed: Parsed<T>): T | undefined {
    if (!parsed.ok) {
      res.status(400).json({ error: parsed.error });
      return undefined;
    }
    return parsed.value;
  }

  private handleError(res: Response, operation: string, err: unknown): void {
    const status = errorStatus(err);
    if (status !== null && err instanceof Error) {
      res.status(status).json({ error: err.message });
      return;
    }
    console.error(`${operation} error:`, err);
    res.status(500).json({ error: 'Internal server error' });
  }

  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server = this.app.listen(this.port, () => {
        console.log(`HTTP server listening on port ${this.port}`);
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
          console.log('HTTP server stopped');
          this.server = null;
          resolve();
        });
      } else {
        resolve();
      }
    });
  }
}
