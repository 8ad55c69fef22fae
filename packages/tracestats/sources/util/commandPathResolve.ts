import { constants } from "node:fs";
import { access } from "node:fs/promises";
import path from "node:path";

/**
 * Finds an executable the way a shell would: paths containing a separator are
 * checked directly, bare names are looked up in each PATH entry.
 * Returns null when nothing executable is found.
 */
export async function commandPathResolve(
    command: string,
    envPath: string | undefined = process.env.PATH,
    platform: NodeJS.Platform = process.platform
): Promise<string | null> {
    if (command.includes("/") || command.includes(path.sep)) {
        return (await executableIs(command)) ? command : null;
    }

    const directories = (envPath ?? "").split(path.delimiter).filter((entry) => entry.length > 0);
    const extensions = platform === "win32" ? ["", ".exe", ".cmd", ".bat"] : [""];
    for (const directory of directories) {
        for (const extension of extensions) {
            const candidate = path.join(directory, `${command}${extension}`);
            if (await executableIs(candidate)) {
                return candidate;
            }
        }
    }
    return null;
}

async function executableIs(candidate: string): Promise<boolean> {
    return access(candidate, constants.X_OK)
        .then(() => true)
        .catch(() => false);
}
