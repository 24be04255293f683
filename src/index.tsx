import React from "react";
import { createRoot } from "react-dom/client";
import { App } from "./components/app";

const container = document.getElementById("app");
if (!container) throw new Error("Missing #app container");

createRoot(container).render(<App />);
