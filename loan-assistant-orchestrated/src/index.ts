import { appConfig } from "./config/appConfig";
import { createChatbotServer } from "./chatbotServer";
import { Orchestrator } from "./agents/orchestrator/Orchestrator";
import { auditTrail } from "./auditTracking/audit";
import { eventBus } from "./eventBus/eventBus";
import { loadLendingPolicy } from "./registry/lendingPolicy";
import { JsonCustomerRepository } from "./repositories/customerRepository";
import { SessionStore } from "./store/sessionStore";
import { logger } from "./utils/logger";

const policy = loadLendingPolicy();
const customers = JsonCustomerRepository.fromDirectory(appConfig.dataDir);

auditTrail.attach(eventBus);

const app = createChatbotServer({
  orchestrator: new Orchestrator({
    policy,
    customers,
    uploadsDir: appConfig.uploadsDir,
    bus: eventBus,
  }),
  sessions: new SessionStore(policy.loan.defaultInterestRate),
  auditTrail,
  bus: eventBus,
  uploadsDir: appConfig.uploadsDir,
  corsOrigin: appConfig.corsOrigin,
});

const server = app.listen(appConfig.port, () => {
  logger.info(`Personal loan assistant listening on http://localhost:${appConfig.port}`, {
    lender: policy.lender.name,
  });
});

// Handle shutdown gracefully
process.on("SIGTERM", () => {
  logger.info("SIGTERM received. Shutting down gracefully...");
  server.close(() => {
    logger.info("Server closed");
    process.exit(0);
  });
});
