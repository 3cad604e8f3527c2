import { StrictMode } from "react";
import { createRoot } from "react-dom/client";
import { loadConfig } from "../config";
import { createLoggers } from "../logger";
import { createDashboardSession } from "./session";
import { DashboardApp } from "./shared/dashboard-app";
import "./app.css";

const container = document.getElementById("root");
if (!container) {
  throw new Error("Missing root container");
}

const config = loadConfig(import.meta.env);
const loggers = createLoggers(config);
const session = createDashboardSession(config, loggers);

createRoot(container).render(
  <StrictMode>
    <DashboardApp session={session} />
  </StrictMode>,
);
