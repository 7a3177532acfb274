import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument, Types } from 'mongoose';
import { ChatIntent } from '../chatbot.constants';

export type ChatMessageDocument = HydratedDocument<ChatMessage>;

export type ChatSender = 'user' | 'bot';

@Schema({ timestamps: true })
export class ChatMessage {
  @Prop({ type: Types.ObjectId, ref: 'User', required: true, index: true })
  userId!: Types.ObjectId;

  @Prop({ type: String, required: true, enum: ['user', 'bot'] })
  sender!: ChatSender;

  @Prop({ type: String, required: true })
  text!: string;

  @Prop({ type: String, default: null })
  intent?: ChatIntent | null;

  @Prop({ type: [String], default: [] })
  suggestions!: string[];

  @Prop({ type: Object, default: null })
  context?: Record<string, unknown> | null;

  createdAt?: Date;
  updatedAt?: Date;
}

export const ChatMessageSchema = SchemaFactory.createForClass(ChatMessage);

ChatMessageSchema.index({ userId: 1, createdAt: -1 });
