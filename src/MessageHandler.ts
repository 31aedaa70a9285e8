export type MessageHandler = (topic: string, payload: Buffer) => void;
