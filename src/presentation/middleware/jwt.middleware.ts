import { Request, Response, NextFunction, RequestHandler } from "express";
import { CallerIdentity, IIdentityVerifier } from "../../domain/interfaces/iidentity.verifier";
import { AuthenticationError } from "../../domain/errors/app.errors";
import { failureResult } from "../dto/summarize-audio.dto";
import { createLogger } from "../../infrastructure/logging/logger";

export interface AuthenticatedRequest extends Request {
  user?: CallerIdentity;
}

const logger = createLogger("AuthMiddleware");

export function createJwtMiddleware(verifier: IIdentityVerifier): RequestHandler {
  return async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
    const authHeader = req.headers.authorization;

    if (!authHeader) {
      res.status(401).json(failureResult("Authorization header missing"));
      return;
    }

    if (!authHeader.startsWith("Bearer ")) {
      res.status(401).json(failureResult("Invalid authorization header"));
      return;
    }

    const token = authHeader.slice(7).trim();
    if (!token) {
      res.status(401).json(failureResult("Token missing"));
      return;
    }

    try {
      req.user = await verifier.verify(token);
    } catch (error) {
      if (error instanceof AuthenticationError) {
        res.status(401).json(failureResult(error.message));
        return;
      }
      logger.error("Token verification failed", error);
      res.status(500).json(failureResult("Authentication error"));
      return;
    }

    next();
  };
}
