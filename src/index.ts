import "dotenv/config";
import { createApp } from "./app.js";
import { startServer } from "./server.js";

const app = createApp();
startServer(app);

export default app;
