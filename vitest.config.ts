import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/__tests__/**/*.test.ts"],
    clearMocks: true,
    // config.ts parses process.env at import time
    env: {
      NODE_ENV: "test",
      LOG_LEVEL: "silent",
      MQTT_BROKER_URL: "mqtt://localhost:1883",
    },
  },
});
