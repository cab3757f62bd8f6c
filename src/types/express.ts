// Per-request fields set by middleware

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

export {};
