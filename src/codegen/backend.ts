/**
 * Process Backends
 *
 * A backend supplies the Go helpers that spawn external commands and wire
 * pipelines. Lowering rules call `runCommand` and `runPipeline` by name and
 * never depend on which backend is selected.
 */

import type { BackendName } from "../core/types.js";

export const GEXE_IMPORT = "github.com/vladimirvivien/gexe";

export interface HelperSource {
  /** Import paths the helper body uses */
  imports: string[];
  /** Go source of the helper */
  source: string;
}

export interface ProcessBackend {
  readonly name: BackendName;
  /** `runCommand(name string, args ...string) error` */
  readonly command: HelperSource;
  /** `runPipeline(stages ...*exec.Cmd) error` */
  readonly pipeline: HelperSource;
  /** Import path of the package providing pipeline stage constructors */
  readonly stageImport: string;
  /** Go expression creating one pipeline stage */
  stage(name: string, args: string[]): string;
}

const PIPELINE: HelperSource = {
  imports: ["fmt", "os", "os/exec"],
  source: `// runPipeline wires each stage's stdout into the next stage's stdin,
// starts every stage, then waits on all of them. The first failure wins.
func runPipeline(stages ...*exec.Cmd) error {
	for i, cmd := range stages {
		cmd.Stderr = os.Stderr
		if i == 0 {
			cmd.Stdin = os.Stdin
		}
		if i == len(stages)-1 {
			cmd.Stdout = os.Stdout
			continue
		}
		out, err := cmd.StdoutPipe()
		if err != nil {
			return fmt.Errorf("%s: %w", cmd.Path, err)
		}
		stages[i+1].Stdin = out
	}
	for i, cmd := range stages {
		if err := cmd.Start(); err != nil {
			for _, started := range stages[:i] {
				started.Process.Kill()
				started.Wait()
			}
			return fmt.Errorf("%s: %w", cmd.Path, err)
		}
	}
	var first error
	for _, cmd := range stages {
		if err := cmd.Wait(); err != nil && first == nil {
			first = fmt.Errorf("%s: %w", cmd.Path, err)
		}
	}
	return first
}`,
};

function execStage(name: string, args: string[]): string {
  return `exec.Command(${[name, ...args].join(", ")})`;
}

export const execBackend: ProcessBackend = {
  name: "exec",
  command: {
    imports: ["fmt", "os", "os/exec"],
    source: `// runCommand runs an external command on the current os.Stdin, os.Stdout
// and os.Stderr, which redirections may have replaced, and reports a
// failed start or a non-zero exit as an error.
func runCommand(name string, args ...string) error {
	cmd := exec.Command(name, args...)
	cmd.Stdin = os.Stdin
	cmd.Stdout = os.Stdout
	cmd.Stderr = os.Stderr
	if err := cmd.Run(); err != nil {
		return fmt.Errorf("%s: %w", name, err)
	}
	return nil
}`,
  },
  pipeline: PIPELINE,
  stageImport: "os/exec",
  stage: execStage,
};

export const gexeBackend: ProcessBackend = {
  name: "gexe",
  command: {
    imports: ["fmt", "io", "os", "strconv", "strings", GEXE_IMPORT],
    source: `// runCommand runs an external command through gexe, copies its stdout
// and stderr to the current os.Stdout and os.Stderr, and reports a failed
// start or a non-zero exit as an error.
func runCommand(name string, args ...string) error {
	words := make([]string, 0, len(args)+1)
	for _, word := range append([]string{name}, args...) {
		words = append(words, strconv.Quote(word))
	}
	proc := gexe.StartProc(strings.Join(words, " "))
	if err := proc.Err(); err != nil {
		return fmt.Errorf("%s: %w", name, err)
	}
	stdout, stderr := os.Stdout, os.Stderr
	copied := make(chan struct{})
	go func() {
		io.Copy(stderr, proc.StdErr())
		close(copied)
	}()
	io.Copy(stdout, proc.StdOut())
	<-copied
	proc.Wait()
	if err := proc.Err(); err != nil {
		return fmt.Errorf("%s: %w", name, err)
	}
	if code := proc.ExitCode(); code != 0 {
		return fmt.Errorf("%s: exit status %d", name, code)
	}
	return nil
}`,
  },
  pipeline: PIPELINE,
  stageImport: "os/exec",
  stage: execStage,
};

const BACKENDS: Record<BackendName, ProcessBackend> = {
  exec: execBackend,
  gexe: gexeBackend,
};

export function getBackend(name: BackendName): ProcessBackend {
  return BACKENDS[name];
}
