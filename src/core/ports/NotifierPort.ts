export abstract class NotifierPort {
  abstract sendText(recipient: string, text: string): Promise<void>;
}
