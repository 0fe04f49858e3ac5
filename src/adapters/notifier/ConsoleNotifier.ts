import { NotifierPort } from "../../core/ports/NotifierPort";

/** Canal del operador de último recurso: el log del proceso. */
export class ConsoleNotifier extends NotifierPort {
  async sendText(recipient: string, text: string): Promise<void> {
    console.log(`[ConsoleNotifier] -> ${recipient}\n${text}`);
  }
}
