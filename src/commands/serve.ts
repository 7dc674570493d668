import { Command } from "commander";
import { startServer } from "../server";
import { loadConfig } from "../utils/config";
import { ValidationError } from "../utils/errors";
import { exitWithError } from "./shared";

export const serveCommand = new Command("serve")
  .description("Start the web front end and HTTP API")
  .option("--port <port>", "Port to listen on (defaults to API_PORT or 3001)")
  .action((options: { port?: string }) => {
    try {
      const config = loadConfig();
      const port = options.port === undefined ? config.apiPort : Number(options.port);
      if (!Number.isInteger(port) || port < 0 || port > 65535) {
        throw new ValidationError(`Invalid port: ${options.port}`);
      }

      const server = startServer(config, port);
      server.on("error", (error) => exitWithError(error));
    } catch (error) {
      exitWithError(error);
    }
  });
