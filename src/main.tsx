import "@/styles/globals.css";
import { HeroUIProvider } from "@heroui/react";
import React from "react";
import ReactDOM from "react-dom/client";
import { Loader } from "./loader.tsx";

const root = document.getElementById("root");

if (!root) {
  throw new Error("Root element not found");
}

ReactDOM.createRoot(root).render(
  <React.StrictMode>
    <HeroUIProvider>
      <Loader />
    </HeroUIProvider>
  </React.StrictMode>,
);
