/**
 * Runtime Helper Registry
 *
 * Go helpers appended to generated programs. Registry order is the order
 * they appear in the output; a helper is emitted only when some lowering
 * (or another helper) needs it.
 */

import type { HelperSource, ProcessBackend } from "./backend.js";

export type HelperName =
  | "statusError"
  | "arg"
  | "toInt"
  | "returnStatus"
  | "testStatus"
  | "fileTest"
  | "runCommand"
  | "runPipeline"
  | "printWorkingDir"
  | "ignoreNotExist"
  | "copyFile"
  | "readLine"
  | "subshell"
  | "redirectOutput"
  | "redirectInput"
  | "jobGroup"
  | "concatItems"
  | "globItems";

interface HelperDefinition {
  /** Other helpers the source calls */
  deps: HelperName[];
  /** Fixed source, or the backend's */
  source: HelperSource | ((backend: ProcessBackend) => HelperSource);
}

const HELPERS: Record<HelperName, HelperDefinition> = {
  statusError: {
    deps: [],
    source: {
      imports: ["fmt"],
      source: `// statusError carries an exit status out of run.
type statusError int

func (s statusError) Error() string {
	return fmt.Sprintf("exit status %d", int(s))
}`,
    },
  },
  arg: {
    deps: [],
    source: {
      imports: [],
      source: `// arg returns positional parameter n, or "" when it is unset.
func arg(args []string, n int) string {
	if n >= 1 && n <= len(args) {
		return args[n-1]
	}
	return ""
}`,
    },
  },
  toInt: {
    deps: [],
    source: {
      imports: ["strconv", "strings"],
      source: `func toInt(value string) int {
	n, err := strconv.Atoi(strings.TrimSpace(value))
	if err != nil {
		return 0
	}
	return n
}`,
    },
  },
  returnStatus: {
    deps: ["toInt", "statusError"],
    source: {
      imports: [],
      source: `func returnStatus(value string) error {
	if n := toInt(value); n != 0 {
		return statusError(n)
	}
	return nil
}`,
    },
  },
  testStatus: {
    deps: ["statusError"],
    source: {
      imports: [],
      source: `func testStatus(ok bool) error {
	if ok {
		return nil
	}
	return statusError(1)
}`,
    },
  },
  fileTest: {
    deps: [],
    source: {
      imports: ["os"],
      source: `func fileTest(op string, path string) bool {
	info, err := os.Stat(path)
	if err != nil {
		return false
	}
	switch op {
	case "-f":
		return info.Mode().IsRegular()
	case "-d":
		return info.IsDir()
	}
	return true
}`,
    },
  },
  runCommand: {
    deps: [],
    source: (backend) => backend.command,
  },
  runPipeline: {
    deps: [],
    source: (backend) => backend.pipeline,
  },
  printWorkingDir: {
    deps: [],
    source: {
      imports: ["fmt", "os"],
      source: `func printWorkingDir() error {
	dir, err := os.Getwd()
	if err != nil {
		return err
	}
	fmt.Println(dir)
	return nil
}`,
    },
  },
  ignoreNotExist: {
    deps: [],
    source: {
      imports: ["os"],
      source: `func ignoreNotExist(err error) error {
	if os.IsNotExist(err) {
		return nil
	}
	return err
}`,
    },
  },
  copyFile: {
    deps: [],
    source: {
      imports: ["os", "path/filepath"],
      source: `// copyFile copies src to dst, or into dst when dst is a directory.
func copyFile(src, dst string) error {
	data, err := os.ReadFile(src)
	if err != nil {
		return err
	}
	if info, err := os.Stat(dst); err == nil && info.IsDir() {
		dst = filepath.Join(dst, filepath.Base(src))
	}
	return os.WriteFile(dst, data, 0o644)
}`,
    },
  },
  readLine: {
    deps: [],
    source: {
      imports: ["os"],
      source: `// readLine reads one line from stdin into v. It reports false at end of
// input when nothing was read.
func readLine(v *string) bool {
	var line []byte
	buf := make([]byte, 1)
	for {
		n, err := os.Stdin.Read(buf)
		if n > 0 {
			if buf[0] == '\\n' {
				*v = string(line)
				return true
			}
			line = append(line, buf[0])
		}
		if err != nil {
			*v = string(line)
			return len(line) > 0
		}
	}
}`,
    },
  },
  subshell: {
    deps: [],
    source: {
      imports: ["os"],
      source: `// subshell runs body and restores the working directory afterwards.
func subshell(body func() error) (err error) {
	dir, err := os.Getwd()
	if err != nil {
		return err
	}
	defer func() {
		if cerr := os.Chdir(dir); cerr != nil && err == nil {
			err = cerr
		}
	}()
	return body()
}`,
    },
  },
  redirectOutput: {
    deps: [],
    source: {
      imports: ["os"],
      source: `// redirectOutput points stdout (fd 1) or stderr (fd 2) at path while
// body runs.
func redirectOutput(path string, flag int, fd int, body func() error) (err error) {
	f, err := os.OpenFile(path, flag, 0o644)
	if err != nil {
		return err
	}
	defer func() {
		if cerr := f.Close(); cerr != nil && err == nil {
			err = cerr
		}
	}()
	if fd == 2 {
		saved := os.Stderr
		os.Stderr = f
		defer func() { os.Stderr = saved }()
	} else {
		saved := os.Stdout
		os.Stdout = f
		defer func() { os.Stdout = saved }()
	}
	return body()
}`,
    },
  },
  redirectInput: {
    deps: [],
    source: {
      imports: ["os"],
      source: `// redirectInput reads stdin from path while body runs.
func redirectInput(path string, body func() error) (err error) {
	f, err := os.Open(path)
	if err != nil {
		return err
	}
	defer func() {
		if cerr := f.Close(); cerr != nil && err == nil {
			err = cerr
		}
	}()
	saved := os.Stdin
	os.Stdin = f
	defer func() { os.Stdin = saved }()
	return body()
}`,
    },
  },
  jobGroup: {
    deps: [],
    source: {
      imports: ["sync"],
      source: `// jobGroup tracks background jobs and keeps the first failure.
type jobGroup struct {
	wg    sync.WaitGroup
	mu    sync.Mutex
	first error
}

var jobs jobGroup

func (g *jobGroup) Go(job func() error) {
	g.wg.Add(1)
	go func() {
		defer g.wg.Done()
		if err := job(); err != nil {
			g.mu.Lock()
			if g.first == nil {
				g.first = err
			}
			g.mu.Unlock()
		}
	}()
}

func (g *jobGroup) Wait() error {
	g.wg.Wait()
	g.mu.Lock()
	defer g.mu.Unlock()
	err := g.first
	g.first = nil
	return err
}`,
    },
  },
  concatItems: {
    deps: [],
    source: {
      imports: [],
      source: `func concatItems(groups ...[]string) []string {
	var items []string
	for _, group := range groups {
		items = append(items, group...)
	}
	return items
}`,
    },
  },
  globItems: {
    deps: [],
    source: {
      imports: ["path/filepath"],
      source: `// globItems expands pattern, or keeps it as is when nothing matches.
func globItems(pattern string) []string {
	matches, err := filepath.Glob(pattern)
	if err != nil || len(matches) == 0 {
		return []string{pattern}
	}
	return matches
}`,
    },
  },
};

/** Every helper name, in emission order */
export const HELPER_ORDER = Object.keys(HELPERS).filter(isHelperName);

export function isHelperName(name: string): name is HelperName {
  return Object.hasOwn(HELPERS, name);
}

export function helperSource(name: HelperName, backend: ProcessBackend): HelperSource {
  const { source } = HELPERS[name];
  return typeof source === "function" ? source(backend) : source;
}

/** Close a helper set over dependencies, in registry order */
export function resolveHelpers(names: Iterable<HelperName>): HelperName[] {
  const needed = new Set<HelperName>();
  const visit = (name: HelperName) => {
    if (needed.has(name)) {
      return;
    }
    needed.add(name);
    HELPERS[name].deps.forEach(visit);
  };
  for (const name of names) {
    visit(name);
  }
  return HELPER_ORDER.filter((name) => needed.has(name));
}

/** Import paths of the given helpers */
export function helperImports(names: HelperName[], backend: ProcessBackend): string[] {
  return names.flatMap((name) => helperSource(name, backend).imports);
}
