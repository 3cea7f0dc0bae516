import debug from 'debug';

export const NAMESPACES = {
  cli: {
    main: 'lorekeeper:cli'
  },
  campaign: {
    master: 'lorekeeper:campaign:master',
    scene: 'lorekeeper:campaign:scene',
    orchestrator: 'lorekeeper:campaign:orchestrator',
    effects: 'lorekeeper:campaign:effects'
  },
  memory: {
    buffer: 'lorekeeper:memory:buffer',
    compressor: 'lorekeeper:memory:compressor'
  },
  agents: {
    base: 'lorekeeper:agents:base',
    narrator: 'lorekeeper:agents:narrator',
    summarize: 'lorekeeper:agents:summarize',
    planner: 'lorekeeper:agents:planner'
  },
  persistence: {
    saves: 'lorekeeper:persistence:saves',
    transcripts: 'lorekeeper:persistence:transcripts'
  },
  llm: {
    client: 'lorekeeper:llm:client',
    custom: 'lorekeeper:llm:custom'
  }
} as const;

export const createLogger = (namespace: string) => debug(namespace);

export function enableNamespaces(namespaces?: string): void {
  if (namespaces) debug.enable(namespaces);
}
