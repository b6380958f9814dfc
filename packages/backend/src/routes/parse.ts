import { Router, Request, Response, NextFunction } from 'express';
import path from 'node:path';
import fs from 'node:fs/promises';
import {
  LogcatParserOptions,
  bugreportMetrics,
  createLogger,
  loadBugreportLines,
  logcatMetrics,
  monkeyLogMetrics,
  parseBugreport,
  parseLogcat,
  parseMonkeyLog,
  readLines,
  validateMonkeyRun,
} from '@brillopad/parser';
import { AppConfig } from '../config.js';
import { PARSE_KINDS, ParseKind, ParseResult, ResultStore } from '../store.js';

const log = createLogger('parse');

const UPLOAD_ID_RE = /^[\w-]+$/;
const YEAR_RE = /^\d{4}$/;

class HttpError extends Error {
  constructor(readonly status: number, message: string) {
    super(message);
    this.name = 'HttpError';
  }
}

function isParseKind(value: string): value is ParseKind {
  return PARSE_KINDS.some((kind) => kind === value);
}

/**
 * Find the stored upload for an id, whatever its extension.
 */
async function findUpload(uploadDir: string, id: string): Promise<string | undefined> {
  if (!UPLOAD_ID_RE.test(id)) return undefined;
  let names: string[];
  try {
    names = await fs.readdir(uploadDir);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return undefined;
    throw err;
  }
  const name = names.find((n) => path.basename(n, path.extname(n)) === id);
  return name === undefined ? undefined : path.join(uploadDir, name);
}

function logcatOptions(config: AppConfig, year: number | undefined): LogcatParserOptions {
  return {
    year: year ?? config.logcat.year,
    ringBufferSize: config.logcat.ringBufferSize,
    lastPreambleSize: config.logcat.preambleSize,
    processPreambleSize: config.logcat.preambleSize,
  };
}

async function runParser(
  config: AppConfig,
  id: string,
  kind: ParseKind,
  filePath: string,
  year: number | undefined
): Promise<ParseResult> {
  const isZip = path.extname(filePath).toLowerCase() === '.zip';
  const options = logcatOptions(config, year);

  switch (kind) {
    case 'bugreport': {
      const item = parseBugreport(await loadBugreportLines(filePath), options);
      return { id, kind, item, metrics: bugreportMetrics(item) };
    }
    case 'logcat': {
      if (isZip) throw new HttpError(400, 'Only bugreports can be read from a .zip upload');
      const item = parseLogcat(await readLines(filePath), options);
      return { id, kind, item, metrics: { logcat: logcatMetrics(item) } };
    }
    case 'monkey': {
      if (isZip) throw new HttpError(400, 'Only bugreports can be read from a .zip upload');
      const item = parseMonkeyLog(await readLines(filePath));
      return {
        id,
        kind,
        item,
        metrics: { monkey: monkeyLogMetrics(item) },
        problems: validateMonkeyRun(item),
      };
    }
  }
}

/**
 * GET /api/parse/:id?kind=bugreport|logcat|monkey[&year=YYYY]
 * Parse an uploaded file and return the item with its metric maps.
 *
 * GET /api/parse/:id/result
 * Return the last parse result for an upload.
 */
export function createParseRouter(config: AppConfig, store: ResultStore): Router {
  const router = Router();

  const handleParse = async (req: Request, res: Response): Promise<void> => {
    const id = String(req.params.id);
    const kind = String(req.query.kind ?? 'bugreport');
    const yearParam = req.query.year === undefined ? undefined : String(req.query.year);

    if (!isParseKind(kind)) {
      throw new HttpError(400, `Unknown kind "${kind}"; expected one of ${PARSE_KINDS.join(', ')}`);
    }
    if (yearParam !== undefined && !YEAR_RE.test(yearParam)) {
      throw new HttpError(400, `Invalid year "${yearParam}"`);
    }

    const filePath = await findUpload(config.uploadDir, id);
    if (!filePath) {
      throw new HttpError(404, `Upload ${id} not found`);
    }

    const started = Date.now();
    const result = await runParser(
      config,
      id,
      kind,
      filePath,
      yearParam === undefined ? undefined : parseInt(yearParam, 10)
    );
    log.info(`Parsed ${id} as ${kind} in ${Date.now() - started} ms`);

    store.set(id, result);
    res.json(result);
  };

  router.get('/:id', (req: Request, res: Response, next: NextFunction) => {
    handleParse(req, res).catch((err: unknown) => {
      if (err instanceof HttpError) {
        res.status(err.status).json({ error: err.message });
        return;
      }
      next(err);
    });
  });

  router.get('/:id/result', (req: Request, res: Response) => {
    const id = String(req.params.id);
    const result = store.get(id);
    if (!result) {
      res.status(404).json({ error: `No result for upload ${id}` });
      return;
    }
    res.json(result);
  });

  return router;
}
