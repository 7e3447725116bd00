export type NamespaceSegment = string;
export type Namespace = readonly NamespaceSegment[];

export type MessageRole = 'system' | 'user' | 'assistant' | 'tool';

export interface Message {
  role: MessageRole;
  content: string;
  name?: string;
  toolCallId?: string; // only meaningful on tool messages
}

export type Session = Message[];

export interface AnnotatedSession {
  session: Session;
  feedback: string;
}
