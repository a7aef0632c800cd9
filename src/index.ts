import { createServer } from "http";
import { env } from "./config/env.js";
import app from "./app.js";

const httpServer = createServer(app);

httpServer.listen(env.PORT, () => {
    console.log(`
  🏘️  Community Issue Reporting API
  📍 API:         http://localhost:${env.PORT}
  🌍 Environment: ${env.NODE_ENV}
  🔗 Health:      http://localhost:${env.PORT}/api/health
  `);
});
