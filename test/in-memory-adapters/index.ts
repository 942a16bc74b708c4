export { InMemoryEventPublisherAdapter } from './in-memory-event-publisher.adapter';
export {
  ScriptedSigningInvokerAdapter,
  writesOutput,
  returnsOutcome,
  type SigningScript,
} from './scripted-signing-invoker.adapter';
