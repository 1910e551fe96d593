import { test } from "node:test";
import { equal, ok } from "node:assert/strict";

import { configureSource } from "./_configure.ts";
import { DockerEngineSource } from "./docker-engine.ts";

test('docker-engine sources are built from config', () => {
  const source = configureSource({
    type: 'docker-engine',
    socket_path: '/tmp/test-docker.sock',
    swarm_mode: 'auto',
  });
  ok(source instanceof DockerEngineSource);
  equal(source.config.type, 'docker-engine');
  equal(source.config.swarm_mode, 'auto');
});
