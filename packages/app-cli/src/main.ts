#!/usr/bin/env node
import "dotenv/config";
import { runStore } from "./runtime/runStore.js";

runStore()
  .then((connected) => {
    if (!connected) process.exit(1);
  })
  .catch((e) => {
    console.error(e);
    process.exit(1);
  });
