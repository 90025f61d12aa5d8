import twilio from 'twilio';

const { VoiceResponse } = twilio.twiml;

export const RECORD_MAX_LENGTH_SECONDS = 30;
export const RECORD_FINISH_KEY = '#';

export const PROMPTS = {
  greeting:
    'Hello. Ask your question after the beep. When you are done, please hang up or press the pound key.',
  noRecording: 'No recording received. Goodbye.',
  closing: 'If you have another question, please call again. Goodbye.',
} as const;

export type ApologyReason = 'missing_recording' | 'transcription' | 'completion' | 'synthesis';

export const APOLOGIES: Record<ApologyReason, string> = {
  missing_recording: "Sorry, I couldn't find your recording. Goodbye.",
  transcription: 'Sorry, there was an error processing your audio. Please try again later. Goodbye.',
  completion: "Sorry, I couldn't generate an answer at the moment. Goodbye.",
  synthesis: 'Sorry, an error occurred preparing my reply. Goodbye.',
};

/** Greets the caller and records one question, posting the result to `actionUrl`. */
export function buildRecordPrompt(actionUrl: string): string {
  const response = new VoiceResponse();
  response.say(PROMPTS.greeting);
  response.record({
    action: actionUrl,
    maxLength: RECORD_MAX_LENGTH_SECONDS,
    playBeep: true,
    trim: 'trim-silence',
    finishOnKey: RECORD_FINISH_KEY,
  });
  response.say(PROMPTS.noRecording);
  return response.toString();
}

export function buildApology(reason: ApologyReason): string {
  const response = new VoiceResponse();
  response.say(APOLOGIES[reason]);
  return response.toString();
}

export function buildPlayback(audioUrl: string): string {
  const response = new VoiceResponse();
  // Gives the provider a moment before it fetches the freshly written file.
  response.pause({ length: 1 });
  response.play(audioUrl);
  response.say(PROMPTS.closing);
  return response.toString();
}
