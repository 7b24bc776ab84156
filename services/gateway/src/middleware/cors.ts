import cors, { CorsOptions } from "cors";
import { Express } from "express";

export function buildCorsOptions(allowedOrigins: string[]): CorsOptions {
  return {
    origin: (origin: string | undefined, callback: (err: Error | null, allow?: boolean) => void) => {
      if (!origin || allowedOrigins.includes(origin)) {
        callback(null, true);
      } else {
        callback(new Error("Not allowed by CORS"));
      }
    },
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Authorization", "Content-Type", "apikey"],
    credentials: false,
    maxAge: 86400,
  };
}

export function setupCors(app: Express, allowedOrigins: string[]) {
  const options = buildCorsOptions(allowedOrigins);
  app.use(cors(options));
  app.options("*", cors(options));
}
