#!/usr/bin/env node
import * as readline from 'node:readline/promises';
import path from 'path';
import { parseArgs } from 'util';
import { NarratorAgent } from './agents/NarratorAgent.js';
import { PlannerAgent } from './agents/PlannerAgent.js';
import { SummarizeAgent } from './agents/SummarizeAgent.js';
import { createPromptEnvironment } from './agents/BaseAgent.js';
import { bootstrapCampaign } from './campaign/bootstrap.js';
import { EffectChannel } from './campaign/EffectChannel.js';
import { MasterAgent } from './campaign/MasterAgent.js';
import { Orchestrator } from './campaign/Orchestrator.js';
import { PlanningSession, planInteractively } from './campaign/PlanningSession.js';
import { ConfigManager } from './configManager.js';
import { CampaignError, CollaboratorError } from './errors.js';
import { createLogger, enableNamespaces, NAMESPACES } from './logging.js';
import { Compressor } from './memory/Compressor.js';
import { PACKAGE_ROOT } from './paths.js';
import { SaveStore } from './persistence/SaveStore.js';
import { TranscriptStore } from './persistence/TranscriptStore.js';

const cliLog = createLogger(NAMESPACES.cli.main);

const HELP = `Usage: lorekeeper [--new] [--campaign <name>] [--config <path>]

Commands during play:
  /scene <title>   start a new scene
  /end             end the current encounter
  /conclude        conclude the scene and save
  /quit            pause and save`;

async function runPlanning(rl: readline.Interface, planner: PlannerAgent, master: MasterAgent): Promise<void> {
  console.log('Let us plan the campaign. Answer "done" when you are ready.');
  const plan = await planInteractively(
    new PlanningSession(planner),
    (prompt) => rl.question(`${prompt}\n> `),
    (error) => console.warn(error.retryable ? `${error.message} (try again)` : error.message)
  );
  const savedPath = await master.completePlanning(plan);
  console.log(`Campaign "${plan.title}" created (${savedPath}).`);
}

async function playLoop(rl: readline.Interface, orchestrator: Orchestrator, master: MasterAgent): Promise<void> {
  for (;;) {
    const line = (await rl.question('You: ')).trim();
    if (!line) continue;
    try {
      if (line === '/quit') {
        const savedPath = await master.pause();
        console.log(`Saved to ${savedPath}.`);
        return;
      }
      if (line.startsWith('/scene')) {
        const title = line.slice('/scene'.length).trim() || 'Untitled scene';
        if (orchestrator.currentScene()) await orchestrator.concludeScene();
        const scene = orchestrator.startScene(title);
        console.log(`-- ${scene.title} (${scene.sceneId}) --`);
        continue;
      }
      if (line === '/end') {
        const outcome = await orchestrator.endEncounter();
        console.log(outcome.status === 'compressed' ? '(encounter closed, history condensed)' : '(encounter closed)');
        continue;
      }
      if (line === '/conclude') {
        const result = await orchestrator.concludeScene();
        console.log(`Scene "${result.record.title}" recorded.`);
        console.log(`Saved to ${await result.persisted}.`);
        continue;
      }

      if (!orchestrator.currentScene()) orchestrator.startScene('Opening');
      const result = await orchestrator.handlePlayerInput(line);
      console.log(`\n${result.generation.narration}`);
      for (const npc of result.generation.npcLines) console.log(`${npc.speaker}: ${npc.content}`);
      console.log();
    } catch (error) {
      if (error instanceof CollaboratorError) {
        console.warn(error.retryable ? `${error.message} (try again)` : error.message);
      } else if (error instanceof CampaignError) {
        console.warn(error.message);
      } else {
        throw error;
      }
    }
  }
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  const { values } = parseArgs({
    args: argv,
    options: {
      new: { type: 'boolean', default: false },
      campaign: { type: 'string' },
      config: { type: 'string' },
      help: { type: 'boolean', short: 'h', default: false }
    }
  });
  if (values.help) {
    console.log(HELP);
    return;
  }

  const configManager = new ConfigManager(values.config);
  enableNamespaces(configManager.getConfig().debug?.enabledNamespaces);
  const memorySettings = configManager.getMemorySettings();
  const savesDir = path.resolve(PACKAGE_ROOT, configManager.getPersistenceSettings().savesDir);

  const env = createPromptEnvironment();
  const compressor = new Compressor(new SummarizeAgent(configManager, env), memorySettings);
  const saves = new SaveStore(savesDir);
  const master = new MasterAgent({ compressor, saves, transcripts: new TranscriptStore(savesDir) });
  const orchestrator = new Orchestrator({
    master,
    generator: new NarratorAgent(configManager, env),
    effects: new EffectChannel(),
    contextBudgetTokens: memorySettings.hardCeilingTokens
  });

  const boot = await bootstrapCampaign({ master, saves, campaign: values.campaign, fresh: values.new });
  cliLog('bootstrap: %o', boot);

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    if (boot.kind === 'planning') await runPlanning(rl, new PlannerAgent(configManager, env), master);
    if (master.getStatus() === 'archived') {
      console.log(`Campaign "${master.getState().name}" is archived.`);
      return;
    }
    console.log(`Playing "${master.getState().name}". ${HELP.split('\n\n')[1]}`);
    await playLoop(rl, orchestrator, master);
  } finally {
    rl.close();
    await saves.flush();
  }
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
