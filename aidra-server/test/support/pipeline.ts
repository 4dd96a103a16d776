import type { AidraConfig } from '../../src/config/aidra.config';
import {
  ImageUnderstandingAgent,
} from '../../src/features/agents/image-understanding.agent';
import {
  ResponseSynthesisAgent,
} from '../../src/features/agents/response-synthesis.agent';
import {
  SafetyMeasuresAgent,
} from '../../src/features/agents/safety-measures.agent';
import {
  StructuredGenerator,
} from '../../src/features/agents/structured-generator.service';
import {
  AnalysisOrchestrator,
} from '../../src/features/analysis/analysis.orchestrator';
import { ContactsRepo } from '../../src/features/contacts/contacts.repo';
import { ContactsService } from '../../src/features/contacts/contacts.service';
import {
  InMemorySessionStore,
} from '../../src/features/sessions/session.store';
import { SessionsService } from '../../src/features/sessions/sessions.service';
import { testConfig } from './config';
import { Script, ScriptedModelClient } from './scripted-model.client';

/** Wires the real pipeline around a scripted model client. */
export const buildPipeline = (
  script: Script,
  overrides: Partial<AidraConfig> = {},
) => {
  const config = testConfig(overrides);
  const client = new ScriptedModelClient(script);
  const generator = new StructuredGenerator(client, config);
  const store = new InMemorySessionStore();
  const sessions = new SessionsService(store);
  const contacts = new ContactsService(new ContactsRepo());

  const imageAgent = new ImageUnderstandingAgent(generator, config);
  const safetyAgent = new SafetyMeasuresAgent(generator, config);
  const responseAgent = new ResponseSynthesisAgent(generator, config);

  const orchestrator = new AnalysisOrchestrator(
    imageAgent,
    safetyAgent,
    contacts,
    responseAgent,
    sessions,
    config,
  );

  return { config, client, generator, store, sessions, contacts, orchestrator };
};
