import { randomUUID } from 'crypto';
import express, { NextFunction, Request, Response } from 'express';
import http from 'http';
import path from 'path';
import { ChatCompletionClient } from './ai/completionClient';
import type { ReplyProvider } from './ai/types';
import { RecordingProcessor } from './calls/recordingProcessor';
import type { AppConfig } from './env';
import { log } from './log';
import { metricsHandler, metricsMiddleware } from './metrics';
import { healthRouter } from './routes/health';
import { createVoiceWebhookRouter } from './routes/voiceWebhook';
import { AudioStore, STATIC_ROUTE } from './storage/audioStore';
import type { TranscriptionProvider } from './stt/provider';
import { OpenAiTranscriptionProvider } from './stt/providers/openaiTranscription';
import { OpenAiSpeechSynthesizer } from './tts/openaiSpeech';
import type { SpeechSynthesizer } from './tts/types';

export interface PipelineClients {
  transcriber: TranscriptionProvider;
  replier: ReplyProvider;
  synthesizer: SpeechSynthesizer;
}

function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const incomingId = req.header('x-request-id');
  const requestId = incomingId && incomingId.trim() !== '' ? incomingId : randomUUID();
  res.setHeader('x-request-id', requestId);
  req.id = requestId;
  next();
}

function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction,
): void {
  log.error({ err, requestId: req.id }, 'unhandled error');
  res.status(500).json({ error: 'internal_server_error' });
}

export function createPipelineClients(config: AppConfig, store: AudioStore): PipelineClients {
  return {
    transcriber: new OpenAiTranscriptionProvider(config.openai, store),
    replier: new ChatCompletionClient(config.openai),
    synthesizer: new OpenAiSpeechSynthesizer(config.openai, store),
  };
}

export function buildServer(
  config: AppConfig,
  overrides: Partial<PipelineClients> = {},
): { app: express.Express; server: http.Server; processor: RecordingProcessor } {
  const app = express();
  const store = new AudioStore(config.staticDir, config.hostUrl);
  const clients = { ...createPipelineClients(config, store), ...overrides };
  const processor = new RecordingProcessor(clients);

  app.disable('x-powered-by');
  app.use(requestIdMiddleware);
  app.use(metricsMiddleware);
  app.use(express.urlencoded({ extended: false }));
  app.use(express.json());

  app.use('/health', healthRouter);
  app.get('/metrics', (req, res, next) => {
    metricsHandler(req, res).catch(next);
  });
  app.use(STATIC_ROUTE, express.static(path.resolve(config.staticDir)));
  app.use(createVoiceWebhookRouter({ hostUrl: config.hostUrl, processor }));

  app.use(errorHandler);

  const server = http.createServer(app);

  return { app, server, processor };
}
