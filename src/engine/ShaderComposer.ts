// ShaderComposer — turns a WGSL source with shader defines into concrete
// variants.
//
// A composable module is registered once together with every define it may
// test. A variant is then made by naming the defines that are on:
//
//   composer.addComposableModule({ name: "model", source, shaderDefs: ["COLOR_MAP", "NORMAL_MAP"] });
//   const wgsl = composer.compose("model", ["COLOR_MAP"]);
//
// Supported directives, one per line: #ifdef, #ifndef, #else, #endif and
// #define. Directive lines and inactive lines are dropped; active lines are
// kept verbatim.

export class ShaderCompositionError extends Error {
  readonly module: string;
  readonly line: number | null;

  constructor(message: string, module: string, line: number | null = null) {
    super(line === null ? `${module}: ${message}` : `${module}:${line}: ${message}`);
    this.name = "ShaderCompositionError";
    this.module = module;
    this.line = line;
  }
}

export interface ComposableModuleDescriptor {
  name: string;
  source: string;
  shaderDefs: readonly string[];
}

export interface ComposableModule {
  readonly name: string;
  readonly source: string;
  readonly shaderDefs: ReadonlySet<string>;
}

interface Block {
  condition: boolean;
  parentActive: boolean;
  active: boolean;
  seenElse: boolean;
  line: number;
}

const DIRECTIVE = /^#(\w+)(?:\s+(\S+))?\s*$/;

/**
 * Resolves conditional directives in `source`.
 * `declared` lists every define the source is allowed to test; `defined` the ones that are on.
 */
export function preprocess(
  moduleName: string,
  source: string,
  declared: ReadonlySet<string>,
  defined: ReadonlySet<string>,
): string {
  const known = new Set(declared);
  const on = new Set(defined);
  const stack: Block[] = [];
  const out: string[] = [];
  const lines = source.split("\n");

  const isActive = () => (stack.length === 0 ? true : stack[stack.length - 1].active);

  for (let i = 0; i < lines.length; i++) {
    const lineNumber = i + 1;
    const trimmed = lines[i].trim();
    if (!trimmed.startsWith("#")) {
      if (isActive()) out.push(lines[i]);
      continue;
    }

    const match = DIRECTIVE.exec(trimmed);
    if (!match) throw new ShaderCompositionError(`Malformed directive "${trimmed}"`, moduleName, lineNumber);
    const [, directive, name] = match;

    switch (directive) {
      case "ifdef":
      case "ifndef": {
        if (name === undefined) throw new ShaderCompositionError(`#${directive} needs a shader def name`, moduleName, lineNumber);
        if (!known.has(name)) throw new ShaderCompositionError(`Undeclared shader def "${name}"`, moduleName, lineNumber);
        const parentActive = isActive();
        const condition = directive === "ifdef" ? on.has(name) : !on.has(name);
        stack.push({ condition, parentActive, active: parentActive && condition, seenElse: false, line: lineNumber });
        break;
      }
      case "else": {
        const block = stack[stack.length - 1];
        if (!block) throw new ShaderCompositionError("#else without a matching #ifdef", moduleName, lineNumber);
        if (block.seenElse) throw new ShaderCompositionError(`Second #else for the block opened at line ${block.line}`, moduleName, lineNumber);
        block.seenElse = true;
        block.active = block.parentActive && !block.condition;
        break;
      }
      case "endif": {
        if (stack.length === 0) throw new ShaderCompositionError("#endif without a matching #ifdef", moduleName, lineNumber);
        stack.pop();
        break;
      }
      case "define": {
        if (name === undefined) throw new ShaderCompositionError("#define needs a shader def name", moduleName, lineNumber);
        // declared in every variant, switched on only inside an active block
        known.add(name);
        if (isActive()) on.add(name);
        break;
      }
      default:
        throw new ShaderCompositionError(`Unsupported directive #${directive}`, moduleName, lineNumber);
    }
  }

  const open = stack[stack.length - 1];
  if (open) throw new ShaderCompositionError(`Unterminated block opened at line ${open.line}`, moduleName, open.line);

  return out.join("\n");
}

export class ShaderComposer {
  private modules = new Map<string, ComposableModule>();
  private variants = new Map<string, string>();

  /**
   * Registers a module. The source is checked with every declared define
   * both on and off, so structural errors surface here rather than at
   * first use.
   */
  addComposableModule(descriptor: ComposableModuleDescriptor): ComposableModule {
    const shaderDefs = new Set(descriptor.shaderDefs);
    preprocess(descriptor.name, descriptor.source, shaderDefs, shaderDefs);
    preprocess(descriptor.name, descriptor.source, shaderDefs, new Set());

    const module: ComposableModule = { name: descriptor.name, source: descriptor.source, shaderDefs };
    this.modules.set(module.name, module);
    for (const key of this.variants.keys()) {
      if (key.startsWith(`${module.name}|`)) this.variants.delete(key);
    }
    return module;
  }

  hasModule(name: string): boolean {
    return this.modules.has(name);
  }

  /** Returns the WGSL of `name` with exactly `defined` switched on. Results are cached. */
  compose(name: string, defined: readonly string[]): string {
    const module = this.modules.get(name);
    if (!module) throw new ShaderCompositionError("Module has not been added to the composer", name);

    for (const def of defined) {
      if (!module.shaderDefs.has(def)) throw new ShaderCompositionError(`Shader def "${def}" is not declared by this module`, name);
    }

    const key = `${name}|${[...new Set(defined)].sort().join(",")}`;
    let code = this.variants.get(key);
    if (code === undefined) {
      code = preprocess(name, module.source, module.shaderDefs, new Set(defined));
      this.variants.set(key, code);
    }
    return code;
  }
}
