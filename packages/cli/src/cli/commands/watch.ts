import chalk from "chalk";
import { ReconnectingSocket, createLogger, parseBridgeEvent, toError, toWebSocketUrl } from "@spooltag/shared";

import { formatEvent } from "../../lib/format.js";
import { resolveBridgeUrl, type BridgeArgs } from "./common.js";

const RECONNECT_DELAY_MS = 2000;

export type WatchCommandArgs = BridgeArgs & {
  verbose?: boolean;
};

/**
 * Follow the bridge event feed until interrupted, reconnecting when the
 * bridge goes away.
 */
export async function run(argv: WatchCommandArgs): Promise<void> {
  const url = toWebSocketUrl(resolveBridgeUrl(argv.bridge), "/ws/events");
  const logger = createLogger("cli:watch", argv.verbose ? "debug" : "error");

  const socket = new ReconnectingSocket(
    { url, reconnectDelayMs: RECONNECT_DELAY_MS, logger },
    {
      onOpen: () => console.info(chalk.gray(`Watching ${url}`)),
      onMessage: (text) => {
        try {
          const event = parseBridgeEvent(text);
          const line = `${new Date().toLocaleTimeString()} ${formatEvent(event)}`;
          console.info(event.type === "tag_detected" ? chalk.cyan(line) : line);
        } catch (error) {
          logger.warn("Ignoring malformed event", { error: toError(error).message });
        }
      },
      onClose: () => console.info(chalk.yellow(`Disconnected, retrying in ${RECONNECT_DELAY_MS / 1000}s`)),
    },
  );

  await new Promise<void>((resolve) => {
    const stop = () => {
      socket.stop();
      resolve();
    };
    process.once("SIGINT", stop);
    process.once("SIGTERM", stop);
    socket.start();
  });
}
