import { appendFile, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { GitError, type SimpleGit, simpleGit } from "simple-git";
import { errorMessage, hasErrorCode } from "../utils/errorHelpers.js";
import type { GitHost, NoteEntry } from "./GitHost.js";
import { GitHostError } from "./GitHostError.js";

function lines(output: string): string[] {
	return output
		.split("\n")
		.map((line) => line.trim())
		.filter((line) => line.length > 0);
}

/**
 * GitHost backed by the git CLI through simple-git
 */
export class SimpleGitHost implements GitHost {
	private readonly git: SimpleGit;

	private constructor(readonly root: string) {
		this.git = simpleGit({ baseDir: root });
	}

	/**
	 * Open the repository containing `cwd`
	 */
	static async open(cwd: string = process.cwd()): Promise<SimpleGitHost> {
		try {
			const root = await simpleGit({ baseDir: cwd }).revparse(["--show-toplevel"]);
			return new SimpleGitHost(root.trim());
		} catch (error) {
			throw new GitHostError(`Not a git repository (or any parent): ${cwd}`, "NOT_A_REPOSITORY", { cause: error });
		}
	}

	async head(): Promise<string | null> {
		return this.optional(["rev-parse", "--verify", "-q", "HEAD"]);
	}

	async author(): Promise<string> {
		const name = await this.optional(["config", "user.name"]);
		const email = await this.optional(["config", "user.email"]);
		if (!name && !email) {
			return "unknown";
		}
		return email ? `${name ?? "unknown"} <${email}>` : (name ?? "unknown");
	}

	async readNote(ref: string, commit: string): Promise<string | null> {
		try {
			return await this.git.raw(["notes", "--ref", ref, "show", commit]);
		} catch (error) {
			if (error instanceof GitError && /no note found/i.test(error.message)) {
				return null;
			}
			throw this.wrap(error, "GIT_COMMAND_FAILED");
		}
	}

	async writeNote(ref: string, commit: string, content: string): Promise<void> {
		// -C with a blob stores the bytes verbatim; -m and -F would strip whitespace
		const dir = await mkdtemp(path.join(os.tmpdir(), "prompt-receipts-"));
		try {
			const file = path.join(dir, "note.json");
			await writeFile(file, content, "utf8");
			const blob = (await this.run(["hash-object", "-w", file])).trim();
			await this.run(["notes", "--ref", ref, "add", "-f", "-C", blob, commit]);
		} finally {
			await rm(dir, { recursive: true, force: true });
		}
	}

	async removeNote(ref: string, commit: string): Promise<void> {
		await this.run(["notes", "--ref", ref, "remove", "--ignore-missing", commit]);
	}

	async listNotes(ref: string): Promise<NoteEntry[]> {
		if ((await this.resolveRef(ref)) === null) {
			return [];
		}
		const output = await this.run(["notes", "--ref", ref, "list"]);
		return lines(output).map((line) => {
			const [note, commit] = line.split(/\s+/);
			return { commit, note };
		});
	}

	async readBlob(blob: string): Promise<string | null> {
		try {
			return await this.git.raw(["cat-file", "blob", blob]);
		} catch (error) {
			if (error instanceof GitError) {
				return null;
			}
			throw error;
		}
	}

	async blobAt(commit: string, filePath: string): Promise<string | null> {
		return this.optional(["rev-parse", "--verify", "-q", `${commit}:${filePath}`]);
	}

	async hashFile(filePath: string, write = false): Promise<string | null> {
		const args = write ? ["hash-object", "-w", "--", filePath] : ["hash-object", "--", filePath];
		return this.optional(args);
	}

	async changedFiles(commit: string): Promise<string[]> {
		const parents = await this.parents(commit);
		const output =
			parents.length === 0
				? await this.run(["ls-tree", "-r", "--name-only", commit])
				: await this.run(["diff", "--name-only", "--no-renames", parents[0], commit]);
		return lines(output);
	}

	async parents(commit: string): Promise<string[]> {
		const output = await this.run(["rev-list", "--parents", "-n", "1", commit]);
		return lines(output)[0]?.split(/\s+/).slice(1) ?? [];
	}

	async ancestors(commit: string, limit: number): Promise<string[]> {
		if (limit <= 0) {
			return [];
		}
		const output = await this.run(["rev-list", "--first-parent", `--max-count=${limit + 1}`, commit]);
		return lines(output).slice(1);
	}

	async commitExists(commit: string): Promise<boolean> {
		return (await this.optional(["rev-parse", "--verify", "-q", `${commit}^{commit}`])) !== null;
	}

	async resolveRef(ref: string): Promise<string | null> {
		return this.optional(["rev-parse", "--verify", "-q", ref]);
	}

	async updateRef(ref: string, value: string | null): Promise<void> {
		if (value === null) {
			if ((await this.resolveRef(ref)) !== null) {
				await this.run(["update-ref", "-d", ref]);
			}
			return;
		}
		await this.run(["update-ref", ref, value]);
	}

	async hasRemote(remote: string): Promise<boolean> {
		const remotes = await this.git.getRemotes();
		return remotes.some((candidate) => candidate.name === remote);
	}

	async fetchNotes(remote: string, ref: string, scratchRef: string): Promise<boolean> {
		let advertised: string;
		try {
			advertised = await this.git.raw(["ls-remote", remote, ref]);
		} catch (error) {
			throw this.wrap(error, "FETCH_FAILED");
		}
		if (lines(advertised).length === 0) {
			return false;
		}
		try {
			await this.git.raw(["fetch", "--no-tags", remote, `+${ref}:${scratchRef}`]);
		} catch (error) {
			throw this.wrap(error, "FETCH_FAILED");
		}
		return true;
	}

	async pushNotes(remote: string, ref: string): Promise<void> {
		try {
			await this.git.raw(["push", remote, `${ref}:${ref}`]);
		} catch (error) {
			const message = errorMessage(error);
			const rejected = /rejected|non-fast-forward|fetch first/i.test(message);
			throw this.wrap(error, rejected ? "PUSH_REJECTED" : "PUSH_FAILED");
		}
	}

	async absorbNotesHistory(ref: string, otherRef: string): Promise<void> {
		await this.run(["notes", "--ref", ref, "merge", "-q", "-s", "ours", otherRef]);
	}

	async excludeFromTracking(pattern: string): Promise<void> {
		const excludePath = path.resolve(this.root, (await this.run(["rev-parse", "--git-path", "info/exclude"])).trim());
		let current = "";
		try {
			current = await readFile(excludePath, "utf8");
		} catch (error) {
			if (!hasErrorCode(error, "ENOENT")) {
				throw error;
			}
		}
		if (lines(current).includes(pattern)) {
			return;
		}
		const prefix = current.length > 0 && !current.endsWith("\n") ? "\n" : "";
		await appendFile(excludePath, `${prefix}${pattern}\n`, "utf8");
	}

	private async run(args: string[]): Promise<string> {
		try {
			return await this.git.raw(args);
		} catch (error) {
			throw this.wrap(error, "GIT_COMMAND_FAILED");
		}
	}

	/**
	 * Run a command whose failure means "absent"; returns trimmed stdout or null
	 */
	private async optional(args: string[]): Promise<string | null> {
		try {
			const output = (await this.git.raw(args)).trim();
			return output.length > 0 ? output : null;
		} catch (error) {
			if (error instanceof GitError) {
				return null;
			}
			throw error;
		}
	}

	private wrap(error: unknown, code: GitHostError["code"]): GitHostError {
		return new GitHostError(errorMessage(error), code, { cause: error });
	}
}
