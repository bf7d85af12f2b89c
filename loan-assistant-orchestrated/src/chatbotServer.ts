import express from 'express';
import cors from 'cors';
import fs from 'fs';
import path from 'path';
import multer from 'multer';
import { v4 as uuidv4 } from 'uuid';
import { z, ZodError } from 'zod';
import { Orchestrator } from './agents/orchestrator/Orchestrator';
import { AuditTrail } from './auditTracking/audit';
import { EventBus } from './eventBus/eventBus';
import { HttpError, badRequest, conflict, notFound } from './errors/HttpError';
import { InvalidTransitionError } from './orchestrator/stateMachine';
import { SessionStore } from './store/sessionStore';
import { ChatReply, ChatResponseBody, SalaryUploadResponseBody } from './types/chat';
import { LoanSession } from './types/types';
import { logger } from './utils/logger';

export interface ChatbotServerOptions {
    orchestrator: Orchestrator;
    sessions: SessionStore;
    auditTrail: AuditTrail;
    bus: EventBus;
    uploadsDir: string;
    corsOrigin?: string;
}

const ALLOWED_SLIP_TYPES = new Set(['application/pdf', 'image/jpeg', 'image/png', 'image/jpg']);
const SANCTION_LETTER_PATTERN = /^sanction_letter_[\w-]+\.pdf$/;

const chatRequestSchema = z.object({
    session_id: z.string().nullish(),
    message: z.string()
});

const sessionQuerySchema = z.object({
    session_id: z.string({ required_error: 'session_id is required' }).min(1, 'session_id is required')
});

const toChatResponse = (sessionId: string, reply: ChatReply): ChatResponseBody => ({
    session_id: sessionId,
    message: reply.message,
    show_upload: reply.showUpload,
    show_download: reply.showDownload,
    download_file: reply.downloadFile,
    session_ended: reply.sessionEnded
});

function toErrorResponse(err: unknown): [number, { error: string; details?: unknown }] {
    if (err instanceof HttpError) {
        return [err.status, { error: err.message, details: err.details }];
    }
    if (err instanceof ZodError) {
        return [400, { error: 'Invalid request', details: err.issues }];
    }
    if (err instanceof multer.MulterError) {
        return [err.code === 'LIMIT_FILE_SIZE' ? 413 : 400, { error: err.message }];
    }
    if (err instanceof InvalidTransitionError) {
        return [409, { error: err.message }];
    }
    // body-parser errors carry their own 4xx status
    if (err instanceof Error && 'status' in err && typeof err.status === 'number' && err.status < 500) {
        return [err.status, { error: err.message }];
    }

    logger.error('Unhandled error', {
        error: err instanceof Error ? err.message : String(err),
        stack: err instanceof Error ? err.stack : undefined
    });
    return [500, { error: 'Internal server error' }];
}

const safeFileName = (name: string) => path.basename(name).replace(/[^\w.-]/g, '_');

export function createChatbotServer(options: ChatbotServerOptions): express.Express {
    const { orchestrator, sessions, auditTrail, bus, uploadsDir } = options;
    fs.mkdirSync(uploadsDir, { recursive: true });

    const app = express();
    app.use(cors({ origin: options.corsOrigin ?? '*' }));
    app.use(express.json());

    function requireUploadSession(query: unknown): LoanSession {
        const { session_id: sessionId } = sessionQuerySchema.parse(query);
        const session = sessions.get(sessionId);
        if (!session) {
            throw badRequest('Invalid session');
        }
        if (session.step !== 'AWAITING_SALARY_SLIP') {
            throw conflict('No salary slip has been requested for this session');
        }
        return session;
    }

    // A slip the session has recorded stays: a retried decision still relies on it.
    async function discardUnrecordedSlip(file: Express.Multer.File | undefined, query: unknown): Promise<void> {
        if (!file) return;
        const parsed = sessionQuerySchema.safeParse(query);
        const session = parsed.success ? sessions.get(parsed.data.session_id) : undefined;
        if (session?.salarySlip?.filePath === file.path) return;
        try {
            await fs.promises.rm(file.path, { force: true });
        } catch (rmErr) {
            logger.warn('Could not remove salary slip', {
                filePath: file.path,
                error: rmErr instanceof Error ? rmErr.message : String(rmErr)
            });
        }
    }

    const upload = multer({
        storage: multer.diskStorage({
            destination: (_req, _file, cb) => cb(null, uploadsDir),
            filename: (req, file, cb) => {
                const sessionId = typeof req.query.session_id === 'string' ? req.query.session_id : 'unknown';
                cb(null, `salary_${sessionId}_${uuidv4()}_${safeFileName(file.originalname)}`);
            }
        }),
        limits: {
            fileSize: 10 * 1024 * 1024
        },
        fileFilter: (_req, file, cb) => {
            if (!ALLOWED_SLIP_TYPES.has(file.mimetype)) {
                return cb(badRequest('Invalid file type. Please upload PDF or image.'));
            }
            cb(null, true);
        }
    });

    app.get('/', (_req, res) => {
        res.json({ status: 'ok', message: 'Personal Loan Assistant' });
    });

    app.get('/health', (_req, res) => {
        res.json({ status: 'healthy', message: 'Personal Loan Assistant is running' });
    });

    app.post('/chat', async (req, res, next) => {
        try {
            const body = chatRequestSchema.parse(req.body);
            let session = body.session_id ? sessions.get(body.session_id) : undefined;
            if (!session) {
                session = sessions.create();
                logger.info('Session created', { sessionId: session.id });
            }

            const reply = await orchestrator.process(session, body.message);
            res.json(toChatResponse(session.id, reply));
        } catch (err) {
            next(err);
        }
    });

    app.post(
        '/upload-salary',
        (req, _res, next) => {
            try {
                requireUploadSession(req.query);
                next();
            } catch (err) {
                next(err);
            }
        },
        upload.single('file'),
        async (req, res, next) => {
            try {
                const session = requireUploadSession(req.query);
                const file = req.file;
                if (!file) {
                    throw badRequest('file is required');
                }
                logger.info('Salary slip saved', { sessionId: session.id, filename: file.filename, size: file.size });

                const reply = await orchestrator.processSalaryUpload(session, {
                    originalName: file.originalname,
                    mimeType: file.mimetype,
                    filePath: file.path,
                    size: file.size,
                    uploadedAt: Date.now()
                });

                const body: SalaryUploadResponseBody = {
                    success: true,
                    message: reply.message,
                    show_download: reply.showDownload,
                    download_file: reply.downloadFile,
                    session_ended: reply.sessionEnded
                };
                res.json(body);
            } catch (err) {
                await discardUnrecordedSlip(req.file, req.query);
                next(err);
            }
        }
    );

    app.get('/download/:filename', (req, res, next) => {
        const { filename } = req.params;
        const filePath = path.join(uploadsDir, filename);
        if (!SANCTION_LETTER_PATTERN.test(filename) || !fs.existsSync(filePath)) {
            return next(notFound('File not found'));
        }
        res.download(filePath, filename, err => {
            if (err && !res.headersSent) {
                next(err);
            }
        });
    });

    app.post('/reset', (req, res, next) => {
        try {
            const { session_id: sessionId } = sessionQuerySchema.parse(req.query);
            const session = sessions.get(sessionId);
            if (session) {
                sessions.delete(sessionId);
                bus.publish('session.reset', { step: session.step }, sessionId);
            }
            res.json({ success: true, message: 'Session reset successfully' });
        } catch (err) {
            next(err);
        }
    });

    app.get('/sessions/:id/audit', (req, res, next) => {
        const sessionId = req.params.id;
        const events = auditTrail.getTrace(sessionId);
        const session = sessions.get(sessionId);
        if (!session && events.length === 0) {
            return next(notFound('Session not found'));
        }
        res.json({
            session_id: sessionId,
            step: session?.step ?? null,
            events
        });
    });

    app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
        const [status, body] = toErrorResponse(err);
        res.status(status).json(body);
    });

    return app;
}
