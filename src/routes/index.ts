import express from "express";
const router = express.Router();

import healthRoute from "./health";
import planRoute from "./plans";

router.use("/health", healthRoute);
router.use("/api/health", healthRoute);

router.use("/api/v1/plans", planRoute);

export default router;
