import { ConfigService } from '@nestjs/config';
import { KeyPointPrompt, OpenAIService } from '../providers/openai/openai.service';

type Reply = string | Error;

/**
 * 按顺序返回预设模型输出的 OpenAIService
 */
export class FakeOpenAIService extends OpenAIService {
  readonly prompts: KeyPointPrompt[] = [];

  constructor(private readonly replies: Reply[]) {
    super(new ConfigService({}));
  }

  async extractKeyPoints(prompt: KeyPointPrompt): Promise<string> {
    const reply = this.replies[Math.min(this.prompts.length, this.replies.length - 1)];
    this.prompts.push(prompt);
    if (reply instanceof Error) throw reply;
    return reply;
  }
}
