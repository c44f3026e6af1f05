import type { Request, Response } from "express";
import type { ConnectionRegistry } from "../services/connectionRegistry";
import type { DocumentStore } from "../services/documentStore";

export function createSystemController(registry: ConnectionRegistry, store: DocumentStore, wsPath: string) {
  const getServiceInfo = (req: Request, res: Response) => {
    res.status(200).json({
      service: "Drone Alert Relay",
      status: "running",
      endpoints: {
        websocket: wsPath,
        api: "/api/v1",
        health: "/health",
      },
    });
  };

  const getHealth = (req: Request, res: Response) => {
    const connections = registry.stats();

    res.status(store.connected ? 200 : 503).json({
      status: store.connected ? "healthy" : "degraded",
      database_connected: store.connected,
      connections,
      timestamp: new Date().toISOString(),
    });
  };

  const getStats = (req: Request, res: Response) => {
    const counts = registry.stats();

    res.status(200).json({
      status: "success",
      data: {
        ...counts,
        total: counts.drone + counts.application,
        connections: registry.connectionList(),
      },
    });
  };

  return { getServiceInfo, getHealth, getStats };
}
