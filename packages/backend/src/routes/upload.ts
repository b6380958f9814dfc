import { Router, Request, Response } from 'express';
import multer from 'multer';
import path from 'node:path';
import fs from 'node:fs';
import crypto from 'node:crypto';
import { AppConfig } from '../config.js';

export const ACCEPTED_EXTENSIONS = ['.txt', '.log', '.zip'];

function getUpload(config: AppConfig) {
  fs.mkdirSync(config.uploadDir, { recursive: true });

  const storage = multer.diskStorage({
    destination: config.uploadDir,
    filename: (_req, file, cb) => {
      const id = crypto.randomUUID();
      const ext = path.extname(file.originalname).toLowerCase();
      cb(null, `${id}${ext}`);
    },
  });

  return multer({
    storage,
    limits: { fileSize: config.maxFileSize },
    fileFilter: (_req, file, cb) => {
      if (ACCEPTED_EXTENSIONS.includes(path.extname(file.originalname).toLowerCase())) {
        cb(null, true);
      } else {
        cb(new Error(`Only ${ACCEPTED_EXTENSIONS.join(', ')} files are accepted`));
      }
    },
  });
}

/**
 * POST /api/upload
 * Upload a bugreport (.txt or .zip), a logcat capture or a monkey log.
 * Returns { id, filename, size, path }.
 */
export function createUploadRouter(config: AppConfig): Router {
  const router = Router();

  router.post('/', (req: Request, res: Response) => {
    const upload = getUpload(config);
    upload.single('file')(req, res, (err: unknown) => {
      if (err) {
        const message = err instanceof Error ? err.message : String(err);
        return res.status(400).json({ error: message });
      }

      if (!req.file) {
        return res.status(400).json({ error: 'No file uploaded' });
      }

      const id = path.basename(req.file.filename, path.extname(req.file.filename));

      res.json({
        id,
        filename: req.file.originalname,
        size: req.file.size,
        path: req.file.path,
      });
    });
  });

  return router;
}
