import { StrictMode } from "react";
import { createRoot } from "react-dom/client";
import { App } from "./App";
import { resolveLocationGateConfig } from "./config/gateConfig";
import "./index.css";

const rootEl = document.getElementById("root");

if (!rootEl) {
  throw new Error("Root element not found");
}

const config = resolveLocationGateConfig(rootEl.dataset);

createRoot(rootEl).render(
  <StrictMode>
    <App config={config} />
  </StrictMode>,
);
