import { authLogger } from "@ontology-marketplace/shared";
import { buildServer } from "./server.js";

const port = Number(process.env.PORT || 0) || 4200;

buildServer()
  .then(async (app) => {
    await app.listen({ port, host: "0.0.0.0" });
    app.log.info("marketplace-api listening on :" + port);
  })
  .catch((err) => {
    // AuthConfigError lands here before any listener exists.
    authLogger.error({ err }, "marketplace-api failed to start");
    process.exit(1);
  });
