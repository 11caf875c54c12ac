import checkDiskSpace from "check-disk-space";
import path from "node:path";
import { errorMessage } from "./errors";
import { log } from "./logger";

export async function canFitOnDisk(
  sizeInBytes: number,
  targetPath: string = "./",
  safetyBufferBytes: number = 100 * 1024 * 1024
): Promise<boolean> {
  try {
    const diskSpace = await checkDiskSpace(path.resolve(targetPath));
    const availableSpace = diskSpace.free - safetyBufferBytes;
    return sizeInBytes <= availableSpace;
  } catch (error) {
    log.error({ err: errorMessage(error), targetPath }, "disk space check failed");
    // can't tell, so refuse
    return false;
  }
}
