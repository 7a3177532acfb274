import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectModel } from '@nestjs/mongoose';
import { Model, Types } from 'mongoose';
import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { errorMessage } from '../common/utils/http-error.util';
import { CHATBOT_CONFIG, INITIAL_MESSAGE, OPENAI_CLIENT, SYSTEM_PROMPT } from './chatbot.constants';
import { detectIntent, preprocessMessage, ruleReply, RuleReply, suggestionsFor } from './chatbot.rules';
import { ChatMessage, ChatMessageDocument } from './schemas/chat-message.schema';

export interface ChatReply {
  id: string | null;
  text: string;
  sender: 'bot';
  timestamp: string;
  suggestions: string[];
  intent: string;
}

export interface ChatHistoryEntry {
  id: string;
  text: string;
  sender: string;
  timestamp: string;
  suggestions: string[];
}

@Injectable()
export class ChatbotService {
  private readonly logger = new Logger(ChatbotService.name);
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly temperature: number;

  constructor(
    @InjectModel(ChatMessage.name) private chatMessageModel: Model<ChatMessage>,
    @Inject(OPENAI_CLIENT) private readonly openai: OpenAI | null,
    private readonly configService: ConfigService,
  ) {
    this.model = this.configService.get<string>('OPENAI_MODEL') || 'gpt-4o-mini';
    this.maxTokens = this.configService.get<number>('OPENAI_MAX_TOKENS') ?? 1500;
    this.temperature = this.configService.get<number>('OPENAI_TEMPERATURE') ?? 0.7;
    if (!this.openai) {
      this.logger.warn('Missing OPENAI_API_KEY; chatbot answers from keyword rules only');
    }
  }

  get isAiEnabled(): boolean {
    return this.openai !== null;
  }

  /**
   * Answers a message. Only messages of authenticated users are stored.
   */
  async sendMessage(message: string, userId?: string, context?: Record<string, unknown>): Promise<ChatReply> {
    const history = userId ? await this.recentContext(userId) : [];

    if (userId) {
      await this.chatMessageModel.create({
        userId: new Types.ObjectId(userId),
        sender: 'user',
        text: message,
        context: context ?? null,
      });
    }

    const reply = await this.generateReply(message, history);

    let id: string | null = null;
    let timestamp = new Date();
    if (userId) {
      const saved = await this.chatMessageModel.create({
        userId: new Types.ObjectId(userId),
        sender: 'bot',
        text: reply.text,
        intent: reply.intent,
        suggestions: reply.suggestions,
      });
      id = saved._id.toString();
      timestamp = saved.createdAt ?? timestamp;
    }

    this.logger.log(`Chat reply generated (intent: ${reply.intent}, user: ${userId ?? 'anonymous'})`);
    return {
      id,
      text: reply.text,
      sender: 'bot',
      timestamp: timestamp.toISOString(),
      suggestions: reply.suggestions,
      intent: reply.intent,
    };
  }

  async getHistory(userId: string, limit = 50): Promise<ChatHistoryEntry[]> {
    const messages = await this.chatMessageModel
      .find({ userId: new Types.ObjectId(userId) })
      .sort({ createdAt: -1 })
      .limit(limit)
      .exec();

    return messages.reverse().map((message: ChatMessageDocument) => ({
      id: message._id.toString(),
      text: message.text,
      sender: message.sender,
      timestamp: (message.createdAt ?? new Date()).toISOString(),
      suggestions: message.suggestions,
    }));
  }

  getInitialMessage() {
    return { message: INITIAL_MESSAGE.message, suggestions: [...INITIAL_MESSAGE.suggestions] };
  }

  getConfig() {
    return { ...CHATBOT_CONFIG };
  }

  private async generateReply(message: string, history: ChatCompletionMessageParam[]): Promise<RuleReply> {
    if (!this.openai) {
      return ruleReply(message);
    }

    try {
      const completion = await this.openai.chat.completions.create({
        model: this.model,
        max_tokens: this.maxTokens,
        temperature: this.temperature,
        messages: [{ role: 'system', content: SYSTEM_PROMPT }, ...history, { role: 'user', content: message }],
      });
      const text = completion.choices[0]?.message?.content?.trim();
      if (!text) {
        throw new Error('Empty completion');
      }
      const intent = detectIntent(preprocessMessage(message));
      return { text, intent, suggestions: suggestionsFor(intent) };
    } catch (error) {
      this.logger.warn(`OpenAI completion failed, using keyword rules: ${errorMessage(error)}`);
      return ruleReply(message);
    }
  }

  private async recentContext(userId: string): Promise<ChatCompletionMessageParam[]> {
    if (!this.openai) {
      return [];
    }
    const recent = await this.getHistory(userId, CHATBOT_CONFIG.max_context_length);
    return recent.map((entry): ChatCompletionMessageParam =>
      entry.sender === 'user'
        ? { role: 'user', content: entry.text }
        : { role: 'assistant', content: entry.text },
    );
  }
}
