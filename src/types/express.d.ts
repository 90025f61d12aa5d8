export {};

declare global {
  namespace Express {
    interface Request {
      /** Set by the request-id middleware; echoed as x-request-id. */
      id?: string;
    }
  }
}
