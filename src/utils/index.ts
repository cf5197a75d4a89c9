export { sendError, sendSuccess, openEventStream, sendEvent } from "./response.js";
