import type { Request, Response } from "express";

export interface HealthInfo {
  store: "sqlite" | "memory";
}

export const createHealthController = (info: HealthInfo) => (_req: Request, res: Response) => {
  return res.status(200).json({ status: "ok", store: info.store, uptime: process.uptime() });
};
