import express, { Express } from "express";
import cors from "cors";
import { ReportController } from "./presentation/controllers/report.controller";
import { createReportRoutes } from "./presentation/routes/report.routes";
import { createJwtMiddleware } from "./presentation/middleware/jwt.middleware";
import { errorHandler, notFound } from "./presentation/middleware/error.middleware";
import { IIdentityVerifier } from "./domain/interfaces/iidentity.verifier";

export interface AppDependencies {
  reportController: ReportController;
  identityVerifier: IIdentityVerifier;
  frontendUrl: string;
}

export function createApp(deps: AppDependencies): Express {
  const app = express();

  app.use(
    cors({
      origin: deps.frontendUrl,
      credentials: true,
    })
  );
  app.use(express.json({ limit: "1mb" }));

  app.use("/api", createReportRoutes(deps.reportController, createJwtMiddleware(deps.identityVerifier)));

  app.use(notFound);
  app.use(errorHandler);

  return app;
}
