// Raw JSON body captured by the parser in app.ts for callback signatures.
declare global {
  namespace Express {
    interface Request {
      rawBody?: Buffer;
    }
  }
}

export {};
