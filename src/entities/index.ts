export { Conversation } from './conversation.entity';
export { Message } from './message.entity';
export { InfoSource } from './info-source.entity';
