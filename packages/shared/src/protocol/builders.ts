import { keySetToHex, type KeySet } from "../crypto/key-derivation.js";
import { imageToBase64Blocks, type TagImage } from "../tag/image.js";
import { bytesToHex } from "../utils/hex.js";
import type {
  CancelCommand,
  ErrorMessage,
  ReadTagCommand,
  StatusMessage,
  TagDataMessage,
  TagDetectedMessage,
  WriteResultMessage,
  WriteTagCommand,
} from "./messages.js";

export function readTagCommand(requestId: string, keys?: KeySet): ReadTagCommand {
  return keys
    ? { action: "READ_TAG", request_id: requestId, keys: keySetToHex(keys) }
    : { action: "READ_TAG", request_id: requestId };
}

export function writeTagCommand(
  requestId: string,
  image: TagImage,
  keys: readonly (Uint8Array | null)[],
  targetUid?: Uint8Array,
): WriteTagCommand {
  const command: WriteTagCommand = {
    action: "WRITE_TAG",
    request_id: requestId,
    keys: keys.map((key) => (key ? bytesToHex(key) : null)),
    blocks: imageToBase64Blocks(image),
  };
  if (targetUid) {
    command.uid = bytesToHex(targetUid);
  }
  return command;
}

export function cancelCommand(requestId: string): CancelCommand {
  return { action: "CANCEL", request_id: requestId };
}

export function statusMessage(device: string, connected = true): StatusMessage {
  return { action: "STATUS", connected, device };
}

export function tagDetectedMessage(uid: Uint8Array): TagDetectedMessage {
  return { action: "TAG_DETECTED", uid: bytesToHex(uid) };
}

export function tagDataMessage(
  requestId: string | undefined,
  uid: Uint8Array,
  image: TagImage,
  readableSectors?: number,
): TagDataMessage {
  return {
    action: "TAG_DATA",
    uid: bytesToHex(uid),
    blocks: imageToBase64Blocks(image),
    request_id: requestId,
    readable_sectors: readableSectors,
  };
}

export interface WriteResultInit {
  requestId?: string;
  success: boolean;
  blocksWritten: number;
  uid?: Uint8Array;
  error?: string;
  errorCode?: string;
}

export function writeResultMessage(init: WriteResultInit): WriteResultMessage {
  return {
    action: "WRITE_RESULT",
    success: init.success,
    blocks_written: init.blocksWritten,
    error: init.error,
    error_code: init.errorCode,
    uid: init.uid ? bytesToHex(init.uid) : undefined,
    request_id: init.requestId,
  };
}

export function errorMessage(
  message: string,
  options: { requestId?: string; code?: string } = {},
): ErrorMessage {
  return {
    action: "ERROR",
    message,
    request_id: options.requestId,
    code: options.code,
  };
}
