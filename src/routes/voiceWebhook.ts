import { Response, Router } from 'express';
import { z } from 'zod';
import { RecordingProcessor } from '../calls/recordingProcessor';
import type { RecordingCallback } from '../calls/types';
import { log } from '../log';
import { buildRecordPrompt } from '../twiml/responses';

const optionalField = z.preprocess(
  (value) => (Array.isArray(value) ? value[0] : value),
  z.string().optional(),
);

const RecordingCallbackSchema = z.object({
  RecordingUrl: optionalField,
  RecordingDuration: optionalField,
  RecordingSid: optionalField,
  CallSid: optionalField,
});

export function parseRecordingCallback(body: unknown): RecordingCallback {
  const parsed = RecordingCallbackSchema.safeParse(body ?? {});
  if (!parsed.success) {
    // Non-string fields are advisory; treat the callback as carrying nothing usable.
    return {};
  }
  return {
    recordingUrl: parsed.data.RecordingUrl,
    recordingDuration: parsed.data.RecordingDuration,
    recordingSid: parsed.data.RecordingSid,
    callSid: parsed.data.CallSid,
  };
}

function sendTwiml(res: Response, twiml: string): void {
  res.status(200).type('application/xml').send(twiml);
}

export function createVoiceWebhookRouter(options: {
  hostUrl: string;
  processor: RecordingProcessor;
}): Router {
  const router = Router();
  const recordingActionUrl = `${options.hostUrl.replace(/\/$/, '')}/process_recording`;

  router.post('/voice', (req, res) => {
    const callSid: unknown = req.body?.CallSid;
    log.info(
      { event: 'incoming_call', call_sid: typeof callSid === 'string' ? callSid : undefined, requestId: req.id },
      'incoming call',
    );
    sendTwiml(res, buildRecordPrompt(recordingActionUrl));
  });

  router.post('/process_recording', async (req, res, next) => {
    try {
      const callback = parseRecordingCallback(req.body);
      const outcome = await options.processor.process(callback, { requestId: req.id });
      sendTwiml(res, outcome.twiml);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
