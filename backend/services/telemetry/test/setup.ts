// backend/services/telemetry/test/setup.ts
import { setLogLevel } from "@shared/logger/Logger";

// Specs assert on behavior, not log lines.
setLogLevel("silent");
