import { Docker } from "../deps.ts";

import type { SourceConfig } from "../defs/config.ts";
import { DockerEngineSource, dockerApiFromClient } from "./docker-engine.ts";

export function configureSource(config: SourceConfig) {
  switch (config.type) {
    case 'docker-engine': {
      const client = config.socket_path
        ? new Docker({ socketPath: config.socket_path })
        : new Docker();
      return new DockerEngineSource(config, dockerApiFromClient(client));
    }
    default: {
      const unknown: { type: string } = config;
      throw new Error(`Invalid source 'type' ${unknown.type}`);
    }
  }
};
