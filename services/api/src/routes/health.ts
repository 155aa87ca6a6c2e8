import { Request, Response, Router } from "express";
import { ACTIVITY_CATALOG, HEALTH_KNOWLEDGE_BASE } from "@fitlog/constants";

const router = Router();

router.get("/", (_req: Request, res: Response) => {
    res.status(200).json({
        status: "ok",
        timestamp: new Date().toISOString(),
        uptime: process.uptime(),
        catalogs: {
            activities: ACTIVITY_CATALOG.size,
            healthTopics: HEALTH_KNOWLEDGE_BASE.size,
        },
    });
});

export const healthRoutes = router;
