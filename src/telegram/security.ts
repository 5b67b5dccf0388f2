import { Messenger, type ChatTransport } from "./messenger";

/**
 * Lets through the single authorized chat, and turns everybody else away.
 */
export class SecurityGate {
  constructor(
    private readonly authorizedUser: number,
    private readonly transport: ChatTransport,
  ) {}

  /**
   * Returns a Messenger for the chat if it is authorized, null otherwise.
   */
  async check(chatId: number | undefined): Promise<Messenger | null> {
    if (chatId === undefined) {
      return null;
    }

    const messenger = new Messenger(this.transport, chatId);
    if (chatId === this.authorizedUser) {
      console.log(`[Bot] Security check passed for chat ${chatId}`);
      return messenger;
    }

    console.log(`[Bot] Security check refused chat ${chatId}`);
    await messenger.send("You are not authorized.");
    return null;
  }
}
