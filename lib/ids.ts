import { randomUUID } from "crypto";

export function newBatchId(): string {
  return randomUUID();
}
