/**
 * TUI Application Entry Point
 */

import React, { useCallback } from "react";
import { render, useApp } from "ink";
import { basename } from "path";

import { LogViewer } from "./components/LogViewer.js";
import { buildListOptions } from "../settings/defaults.js";
import type { ViewerSettings } from "../settings/types.js";
import type { LogListModel } from "../widgets/log-list/model.js";
import { getLogger } from "../utils/logger.js";

interface AppProps {
  model: LogListModel;
  title: string;
  settings?: ViewerSettings;
}

function App({ model, title, settings }: AppProps): React.ReactElement {
  const { exit } = useApp();

  const handleExit = useCallback(() => {
    getLogger().debug("Viewer closed");
    exit();
  }, [exit]);

  return <LogViewer model={model} title={title} options={buildListOptions(settings)} onExit={handleExit} />;
}

/**
 * Start the interactive viewer and resolve once it exits.
 */
export async function startTUI(model: LogListModel, path: string, settings?: ViewerSettings): Promise<void> {
  getLogger().info({ path, entries: model.length }, "Starting viewer");
  const { waitUntilExit } = render(<App model={model} title={basename(path)} settings={settings} />);
  await waitUntilExit();
}
