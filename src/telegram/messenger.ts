import { type Notifier } from "../dues/types";

const DEFAULT_BUFFER_SIZE = 8;

export type SendOptions = {
  quiet?: boolean; // deliver without a notification sound
  keyboard?: string[][]; // reply keyboard rows
};

/**
 * The Telegram calls a Messenger needs. Text is always Markdown.
 */
export interface ChatTransport {
  sendMessage(chatId: number, text: string, options?: SendOptions): Promise<number>;
  editMessageText(chatId: number, messageId: number, text: string): Promise<void>;
}

export type MessengerOptions = {
  quiet?: boolean;
  bufferSize?: number;
};

/**
 * Sends messages to one chat, and lets a spawned message be edited in place.
 * Edits are buffered: every `bufferSize` edits (or on flush) the message is updated.
 */
export class Messenger implements Notifier {
  private text = "";
  private sentText: string | null = null;
  private messageId: number | null = null;
  private bufferedEdits = 0;
  private readonly bufferSize: number;

  constructor(
    private readonly transport: ChatTransport,
    readonly chatId: number,
    private readonly options: MessengerOptions = {},
  ) {
    this.bufferSize = options.bufferSize ?? DEFAULT_BUFFER_SIZE;
  }

  get content(): string {
    return this.text;
  }

  /**
   * Sends a new message immediately and returns its id.
   */
  async send(text: string, options?: SendOptions): Promise<number> {
    console.log(`[Bot] Sending message to chat ${this.chatId}`);
    return this.transport.sendMessage(this.chatId, text, {
      quiet: this.options.quiet,
      ...options,
    });
  }

  /**
   * Sends `text` as a new message and returns a Messenger editing it.
   */
  async spawn(text: string, options?: MessengerOptions): Promise<Messenger> {
    const child = new Messenger(this.transport, this.chatId, {
      quiet: this.options.quiet,
      ...options,
    });
    child.text = text;
    child.sentText = text;
    child.messageId = await child.send(text);
    return child;
  }

  /**
   * Spawns a message, runs `body` with it, and flushes pending edits afterwards.
   */
  async withSpawned<T>(
    text: string,
    body: (message: Messenger) => Promise<T>,
    options?: MessengerOptions,
  ): Promise<T> {
    const message = await this.spawn(text, options);
    try {
      return await body(message);
    } finally {
      await message.flush();
    }
  }

  async append(text: string): Promise<void> {
    this.text += text;
    await this.bufferEdit();
  }

  async override(text: string): Promise<void> {
    this.text = text;
    await this.bufferEdit();
  }

  /**
   * Sends buffered edits right away.
   */
  async flush(): Promise<void> {
    if (this.bufferedEdits === 0) {
      return;
    }
    this.bufferedEdits = 0;

    if (this.messageId === null) {
      this.messageId = await this.send(this.text);
    } else if (this.text !== this.sentText) {
      // Telegram rejects edits that do not change the text
      await this.transport.editMessageText(this.chatId, this.messageId, this.text);
    }
    this.sentText = this.text;
  }

  private async bufferEdit(): Promise<void> {
    this.bufferedEdits++;
    if (this.bufferedEdits >= this.bufferSize) {
      await this.flush();
    }
  }
}
