import { NodefredError, NodefredErrorCode } from "../lib/errors";
import { compact, type Serializable } from "./serialize";

/**
 * Modifier keys that can override parts of an `OutputItem` while held.
 */
export enum Key {
  Cmd = "cmd",
  Option = "alt",
  Control = "ctrl",
  Shift = "shift",
  Fn = "fn",
}

/**
 * How Alfred treats an item's `arg`.
 *
 * With `File`, Alfred treats the result as a file on disk and offers its
 * file actions; it checks that the file exists before showing the row.
 * `FileSkipCheck` skips that check when the files are known to exist.
 */
export enum ResultType {
  Default = "default",
  File = "file",
  FileSkipCheck = "file:skipcheck",
}

// Symbolic names and wire strings both resolve here.
const KEY_NAMES = new Map<string, Key>([
  ["Cmd", Key.Cmd],
  ["Option", Key.Option],
  ["Control", Key.Control],
  ["Shift", Key.Shift],
  ["Fn", Key.Fn],
]);

const RESULT_TYPES = new Map<string, ResultType>([
  ["Default", ResultType.Default],
  ["File", ResultType.File],
  ["FileSkipCheck", ResultType.FileSkipCheck],
  [ResultType.Default, ResultType.Default],
  [ResultType.File, ResultType.File],
  [ResultType.FileSkipCheck, ResultType.FileSkipCheck],
]);

/**
 * Wire name of a modifier. Unknown strings pass through untouched so
 * combinations such as `"cmd+alt"` keep working.
 */
export function normalizeModifierKey(key: Key | string): string {
  return KEY_NAMES.get(key) ?? key;
}

export function normalizeResultType(type: ResultType | string | null | undefined): ResultType {
  if (!type) {
    return ResultType.Default;
  }
  const resolved = RESULT_TYPES.get(type);
  if (!resolved) {
    throw invalid(`type must be one of ${[...new Set(RESULT_TYPES.values())].join(", ")}; got '${type}'`);
  }
  return resolved;
}

export type IconType = "fileicon" | "filetype";

const ICON_TYPES: readonly string[] = ["fileicon", "filetype"];

function isIconType(value: string): value is IconType {
  return ICON_TYPES.includes(value);
}

/**
 * Icon for an `OutputItem`. Alfred falls back to the workflow icon when an
 * item has none.
 */
export class Icon implements Serializable {
  /**
   * An image file when `type` is unset, a file whose icon is borrowed for
   * `fileicon`, or a Uniform Type Identifier for `filetype`.
   */
  readonly path: string;
  readonly type?: IconType;

  constructor(path: string, type?: string) {
    let iconType: IconType | undefined;
    if (type) {
      if (!isIconType(type)) {
        throw invalid("if set, icon type must be either fileicon or filetype");
      }
      iconType = type;
    }
    this.path = path;
    this.type = iconType;
    Object.freeze(this);
  }

  /** The contents of the image at `path`. */
  static image(path: string): Icon {
    return new Icon(path);
  }

  /**
   * The icon of the file at `path`, e.g. `Icon.fileIcon("/System/Applications/Calendar.app")`.
   */
  static fileIcon(path: string): Icon {
    return new Icon(path, "fileicon");
  }

  /**
   * The system icon for a Uniform Type Identifier, e.g. `Icon.uti("public.jpeg")`.
   */
  static uti(uti: string): Icon {
    return new Icon(uti, "filetype");
  }

  toJSON(): Record<string, unknown> {
    return compact({ path: this.path, type: this.type });
  }
}

/**
 * What the user gets when copying a row with ⌘C or showing it with ⌘L.
 */
export class Text implements Serializable {
  readonly copy?: string;
  readonly largeType?: string;

  constructor(init: { copy?: string | null; largeType?: string | null }) {
    if (init.copy == null && init.largeType == null) {
      throw invalid("At least one of copy or largeType must be set");
    }
    this.copy = init.copy ?? undefined;
    this.largeType = init.largeType ?? undefined;
    Object.freeze(this);
  }

  toJSON(): Record<string, unknown> {
    return compact({ copy: this.copy, largetype: this.largeType });
  }
}

export type Argument = string | readonly string[];

export interface DataInit {
  subtitle?: string | null;
  arg?: Argument | null;
  icon?: Icon | null;
  valid?: boolean | null;
}

/**
 * Values that replace an item's own while a modifier key is held.
 */
export class Data implements Serializable {
  readonly subtitle?: string;
  readonly arg?: Argument;
  readonly icon?: Icon;
  readonly valid?: boolean;

  constructor(init: DataInit = {}) {
    this.subtitle = init.subtitle ?? undefined;
    this.arg = freezeArgument(init.arg);
    this.icon = init.icon ?? undefined;
    this.valid = init.valid ?? undefined;
    Object.freeze(this);
  }

  toJSON(): Record<string, unknown> {
    return compact({
      subtitle: this.subtitle,
      arg: this.arg,
      icon: this.icon,
      valid: this.valid,
    });
  }
}

export interface ActionInit {
  text?: Argument | null;
  url?: Argument | null;
  file?: Argument | null;
  auto?: Argument | null;
}

/**
 * Typed payload for Universal Actions. Several values may be given so the
 * chosen action runs on all of them.
 */
export class Action implements Serializable {
  readonly text?: Argument;
  readonly url?: Argument;
  readonly file?: Argument;
  readonly auto?: Argument;

  constructor(init: ActionInit) {
    if (init.text == null && init.url == null && init.file == null && init.auto == null) {
      throw invalid("At least one of text, url, file or auto must be set");
    }
    this.text = freezeArgument(init.text);
    this.url = freezeArgument(init.url);
    this.file = freezeArgument(init.file);
    this.auto = freezeArgument(init.auto);
    Object.freeze(this);
  }

  toJSON(): Record<string, unknown> {
    return compact({ text: this.text, url: this.url, file: this.file, auto: this.auto });
  }
}

/**
 * A plain string or list lets Universal Actions detect the type itself; an
 * `Action` states it.
 */
export type ItemAction = string | readonly string[] | Action;

export type ModifierMap = ReadonlyMap<Key | string, Data> | Readonly<Record<string, Data>>;

export interface OutputItemInit {
  /** First line of the row. Required. */
  title: string;
  subtitle?: string | null;
  /** Lets Alfred learn which results get picked most often. */
  uid?: string | null;
  /** Passed to the next object in the workflow. */
  arg?: Argument | null;
  icon?: Icon | null;
  valid?: boolean | null;
  /** Matched against when Alfred filters the results. Defaults to the title. */
  match?: string | null;
  /** Filled into the search field on tab. */
  autocomplete?: string | null;
  mods?: ModifierMap | null;
  text?: Text | null;
  /** URL or file path shown by Quick Look. */
  quicklookUrl?: string | null;
  /** Sent to Universal Actions instead of `arg`. */
  action?: ItemAction | null;
  type?: ResultType | string | null;
}

/**
 * One selectable row in Alfred's result list.
 */
export class OutputItem implements Serializable {
  readonly title: string;
  readonly subtitle?: string;
  readonly uid?: string;
  readonly arg?: Argument;
  readonly icon?: Icon;
  readonly valid?: boolean;
  readonly match?: string;
  readonly autocomplete?: string;
  readonly mods?: Readonly<Record<string, Data>>;
  readonly text?: Text;
  readonly quicklookUrl?: string;
  readonly action?: ItemAction;
  readonly type: ResultType;

  constructor(init: OutputItemInit) {
    if (typeof init.title !== "string" || init.title.length === 0) {
      throw invalid("title must be set");
    }
    this.title = init.title;
    this.subtitle = init.subtitle ?? undefined;
    this.uid = init.uid ?? undefined;
    this.arg = freezeArgument(init.arg);
    this.icon = init.icon ?? undefined;
    this.valid = init.valid ?? undefined;
    this.match = init.match ?? undefined;
    this.autocomplete = init.autocomplete ?? undefined;
    this.mods = init.mods ? normalizeMods(init.mods) : undefined;
    this.text = init.text ?? undefined;
    this.quicklookUrl = init.quicklookUrl ?? undefined;
    this.action = freezeAction(init.action);
    this.type = normalizeResultType(init.type);
    Object.freeze(this);
  }

  toJSON(): Record<string, unknown> {
    return compact({
      title: this.title,
      subtitle: this.subtitle,
      uid: this.uid,
      arg: this.arg,
      icon: this.icon,
      valid: this.valid,
      match: this.match,
      autocomplete: this.autocomplete,
      mods: this.mods,
      text: this.text,
      quicklookurl: this.quicklookUrl,
      action: this.action,
      type: this.type,
    });
  }
}

export interface ScriptFilterOutputInit {
  /** Seconds after which Alfred runs the script filter again, 0.1 to 5. */
  rerun?: number | null;
  items?: readonly OutputItem[] | null;
  /**
   * Passed to the next object in the workflow, and to reruns of this
   * filter, which makes them the place to keep state between runs.
   */
  variables?: Readonly<Record<string, string>> | null;
}

/**
 * What a script filter handler returns.
 */
export class ScriptFilterOutput implements Serializable {
  static readonly MIN_RERUN = 0.1;
  static readonly MAX_RERUN = 5;

  readonly rerun?: number;
  readonly items?: readonly OutputItem[];
  readonly variables?: Readonly<Record<string, string>>;

  constructor(init: ScriptFilterOutputInit = {}) {
    if (
      init.rerun != null &&
      !(init.rerun >= ScriptFilterOutput.MIN_RERUN && init.rerun <= ScriptFilterOutput.MAX_RERUN)
    ) {
      throw invalid(`rerun must be between ${ScriptFilterOutput.MIN_RERUN} and ${ScriptFilterOutput.MAX_RERUN}`);
    }
    this.rerun = init.rerun ?? undefined;
    this.items = init.items ? Object.freeze([...init.items]) : undefined;
    this.variables = init.variables ? Object.freeze({ ...init.variables }) : undefined;
    Object.freeze(this);
  }

  toJSON(): Record<string, unknown> {
    return compact({ rerun: this.rerun, items: this.items, variables: this.variables });
  }
}

function normalizeMods(mods: ModifierMap): Readonly<Record<string, Data>> {
  const entries = isModifierMap(mods) ? [...mods.entries()] : Object.entries(mods);
  const normalized: Record<string, Data> = {};
  for (const [key, data] of entries) {
    normalized[normalizeModifierKey(key)] = data;
  }
  return Object.freeze(normalized);
}

function isModifierMap(mods: ModifierMap): mods is ReadonlyMap<Key | string, Data> {
  return mods instanceof Map;
}

function freezeArgument(arg: Argument | null | undefined): Argument | undefined {
  if (arg == null) return undefined;
  return typeof arg === "object" ? Object.freeze([...arg]) : arg;
}

function freezeAction(action: ItemAction | null | undefined): ItemAction | undefined {
  if (action == null) return undefined;
  if (action instanceof Action) return action;
  return freezeArgument(action);
}

function invalid(message: string): NodefredError {
  return new NodefredError(NodefredErrorCode.INVALID_OUTPUT, message);
}
