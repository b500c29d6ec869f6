// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
    // Tests drive fake PowerShell runners in-process; no pwsh, no network
    pool: "forks",
    fileParallelism: true,
  },
});
