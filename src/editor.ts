import { spawn } from "node:child_process";
import process from "node:process";

import { isErrnoException } from "./errors.js";

export type EditorLauncher = (editor: string, filePath: string) => Promise<void>;

/**
 * Opens `filePath` with the command in $EDITOR. The editor value may carry
 * its own flags ("code --wait"), so it is split on whitespace.
 */
export const launchEditor: EditorLauncher = (editor, filePath) => {
  const [command, ...args] = editor.split(/\s+/).filter(Boolean);
  if (!command) {
    return Promise.reject(new Error("EDITOR is empty"));
  }

  return new Promise((resolve, reject) => {
    const child = spawn(command, [...args, filePath], {
      stdio: "inherit",
      env: process.env,
    });

    child.on("error", (error) => {
      if (isErrnoException(error) && error.code === "ENOENT") {
        reject(new Error(`Editor "${command}" not found on PATH.`));
        return;
      }
      reject(error);
    });

    child.on("close", (code) => {
      if (code === 0) {
        resolve();
      } else {
        reject(new Error(`${editor} exited with code ${code}`));
      }
    });
  });
};
