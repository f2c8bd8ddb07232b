import express, { NextFunction, Request, Response } from 'express';
import multer from 'multer';
import cors from 'cors';
import { parseRole, resolveAuthorizationContext } from './services/AuthorizationContextResolver';
import { RagService } from './services/RagService';
import { TextExtractionService } from './services/TextExtractionService';
import { AuthorizationContext, Role } from './types';
import { InputError, toHttpError, UnknownRoleError } from './utils/errors';

export const USER_HEADER = 'x-authenticated-user';
export const ROLE_HEADER = 'x-authenticated-role';

export interface AppDependencies {
  rag: RagService;
  extractor: TextExtractionService;
  maxUploadBytes: number;
  corsOrigins?: string[];
}

type AuthedHandler = (req: Request, res: Response, auth: AuthorizationContext) => Promise<void>;

class HttpError extends Error {
  constructor(
    public readonly status: number,
    message: string
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

/**
 * The identity pair is set by the authenticating proxy in front of this
 * service and trusted as-is. Body or query fields never contribute to it.
 */
function authFromHeaders(req: Request): AuthorizationContext {
  const subjectId = req.header(USER_HEADER)?.trim();
  const roleHeader = req.header(ROLE_HEADER);
  if (!subjectId || roleHeader === undefined) {
    throw new HttpError(401, 'Missing authenticated identity');
  }
  try {
    return resolveAuthorizationContext(parseRole(roleHeader), subjectId);
  } catch (error) {
    if (error instanceof UnknownRoleError) {
      throw new HttpError(403, error.message);
    }
    throw error;
  }
}

function authenticated(handler: AuthedHandler, options: { privileged?: boolean } = {}) {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve()
      .then(() => {
        const auth = authFromHeaders(req);
        if (options.privileged && auth.role !== Role.Privileged) {
          throw new HttpError(403, 'Admin access required');
        }
        return handler(req, res, auth);
      })
      .catch(next);
  };
}

export function createApp(deps: AppDependencies): express.Express {
  const app = express();
  const { rag, extractor } = deps;

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: deps.maxUploadBytes },
    fileFilter: (_req, file, cb) => {
      if (extractor.isSupported(file.mimetype, file.originalname)) {
        cb(null, true);
      } else {
        cb(new InputError(`Unsupported file type: ${file.mimetype}. Allowed: PDF, DOCX, TXT, MD, CSV`));
      }
    }
  });

  const allowedOrigins: Array<RegExp | string> = [/^http:\/\/localhost(:\d+)?$/, ...(deps.corsOrigins ?? [])];
  app.use(
    cors({
      origin: (origin, callback) => {
        // Non-browser clients send no origin
        if (!origin) return callback(null, true);
        const isAllowed = allowedOrigins.some(pattern =>
          typeof pattern === 'string' ? pattern === origin : pattern.test(origin)
        );
        callback(isAllowed ? null : new Error('Not allowed by CORS'), isAllowed);
      }
    })
  );
  app.use(express.json());

  app.get('/api/health', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'ok', service: 'rbac-rag' });
  });

  // Runs after the identity check, so anonymous uploads are never buffered.
  const receiveFile = (req: Request, res: Response): Promise<Express.Multer.File | undefined> =>
    new Promise((resolve, reject) => {
      upload.single('file')(req, res, err => {
        if (err instanceof multer.MulterError) {
          reject(new InputError(`Upload error: ${err.message}`));
        } else if (err) {
          reject(err);
        } else {
          resolve(req.file);
        }
      });
    });

  app.post(
    '/api/documents/upload',
    authenticated(async (req, res, auth) => {
      const file = await receiveFile(req, res);
      if (!file) {
        throw new InputError('No file uploaded: send the document in the "file" field');
      }

      const extraction = await extractor.extractText(file.buffer, file.mimetype, file.originalname);
      // Owner comes from the verified identity only; any owner field in the body is ignored.
      const result = await rag.ingest(extraction.text, { userId: auth.subjectId }, { filename: file.originalname });

      res.status(201).json({
        message: `Ingested '${file.originalname}' → ${result.chunkCount} chunks`,
        documentId: result.documentId,
        chunkCount: result.chunkCount,
        filename: file.originalname
      });
    })
  );

  app.get(
    '/api/documents',
    authenticated(async (_req, res, auth) => {
      const documents = await rag.listDocuments(auth);
      res.json({ documents });
    })
  );

  app.delete(
    '/api/documents/:id',
    authenticated(async (req, res, auth) => {
      const deleted = await rag.deleteDocumentAs(auth, req.params.id);
      if (!deleted) {
        throw new HttpError(404, 'Document not found');
      }
      res.json({ message: `Document '${deleted.filename}' and its vectors deleted`, documentId: deleted.documentId });
    })
  );

  app.post(
    '/api/query',
    authenticated(async (req, res, auth) => {
      const body: unknown = req.body;
      const question = typeof body === 'object' && body !== null && 'question' in body ? body.question : undefined;
      const topK = typeof body === 'object' && body !== null && 'top_k' in body ? body.top_k : undefined;

      if (typeof question !== 'string' || question.trim().length === 0) {
        throw new InputError('Please provide a question in the request body');
      }
      if (topK !== undefined && typeof topK !== 'number') {
        throw new InputError('top_k must be a number');
      }

      const result = await rag.query(question, auth, { topK });
      res.json({
        answer: result.answer,
        sources: result.sourceChunks,
        chunksSearched: result.chunksSearched
      });
    })
  );

  app.delete(
    '/api/users/:id/data',
    authenticated(
      async (req, res) => {
        await rag.deleteUserData(req.params.id);
        res.json({ message: `All data of user '${req.params.id}' deleted` });
      },
      { privileged: true }
    )
  );

  app.get(
    '/api/stats',
    authenticated(
      async (_req, res) => {
        res.json(await rag.stats());
      },
      { privileged: true }
    )
  );

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof HttpError) {
      res.status(err.status).json({ error: 'HTTP_ERROR', message: err.message });
      return;
    }
    const { status, body } = toHttpError(err);
    if (status >= 500) {
      console.error(`[Server] ERROR: request failed:`, err);
    }
    res.status(status).json(body);
  });

  return app;
}
