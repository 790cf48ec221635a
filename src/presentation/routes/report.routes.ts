import { NextFunction, Request, RequestHandler, Response, Router } from "express";
import { ReportController } from "../controllers/report.controller";

export function createReportRoutes(reportController: ReportController, authMiddleware: RequestHandler): Router {
  const router = Router();

  // Public
  router.get("/health", (req, res) => reportController.health(req, res));

  // Transcribe, summarize and fill the template; requires a bearer token
  router.post("/summarize", authMiddleware, (req: Request, res: Response, next: NextFunction) => {
    reportController.summarize(req, res).catch(next);
  });

  return router;
}
