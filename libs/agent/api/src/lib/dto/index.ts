export * from './chat.dto';
export * from './conversation.dto';
export * from './profile.dto';
export * from './frame.dto';
