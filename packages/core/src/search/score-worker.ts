import { parentPort } from "node:worker_threads";
import { handleScoreRequest } from "./thread-protocol.js";

const port = parentPort;
if (port) {
  port.on("message", (message: unknown) => {
    port.postMessage(handleScoreRequest(message));
  });
}
