/** `null` is an attribute with no reading yet ("unknown"). */
export type IpcValue = string | number | null;
