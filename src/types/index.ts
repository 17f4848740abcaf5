export type {
  ConversationId,
  MessageId,
  SenderId,
  Transition,
  PresenceState,
  Conversation,
  RelayRecord,
  MediaRef,
  MessageContent,
  RelayCommand,
  InboundEvent,
  UserOutcome,
  OperatorOutcome,
  CommandOutcome,
  DispatchOutcome,
} from './relay.js';

export type {
  LLMProvider,
  OllamaProvider,
  GeminiProvider,
} from './provider.js';

export { DEFAULT_PROVIDER } from './provider.js';

export type {
  RelayConfig,
  RelayPolicy,
  Notices,
  GreetingConfig,
} from './config.js';
