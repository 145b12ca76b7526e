/**
 * Declaration surface of the UI framework user components compile against.
 * - `Component`: base class every template translates to
 * - `h`: element/component factory used by generated `render()` methods
 * - services reachable through `@inject`, and the stock components
 *
 * Shipped as a `.d.ts` string; it is part of the base link unit, never emitted.
 */

export const FRAMEWORK_FILE_NAME = "/framework/playbench.d.ts";

export const FRAMEWORK_DTS = `
// ---- playbench framework surface (declarations only) ----
interface UiEvent {
  readonly type: string;
  readonly target: unknown;
  preventDefault(): void;
}

interface VNode {
  readonly type: string | ComponentType;
  readonly props: Readonly<Record<string, unknown>> | null;
  readonly children: readonly Child[];
}

type Child = VNode | string | number | boolean | null | undefined;

type ComponentType<C extends Component = Component> = new () => C;

type ComponentProps<C extends Component> = Partial<Omit<C, keyof Component>>;

type ElementProps = Record<string, string | number | boolean | null | undefined | ((event: UiEvent) => void)>;

declare abstract class Component {
  children: readonly Child[];
  onInitialized(): void;
  render(): Child[];
  protected stateHasChanged(): void;
}

declare function h(tag: string, props: ElementProps | null, children?: readonly Child[]): VNode;
declare function h<C extends Component>(type: ComponentType<C>, props: ComponentProps<C> | null, children?: readonly Child[]): VNode;

declare function inject<T>(token: abstract new (...args: never[]) => T): T;

declare class DialogService {
  show(title: string, message?: string): Promise<boolean>;
  close(): void;
}

declare class SnackbarService {
  add(message: string, severity?: "normal" | "info" | "success" | "warning" | "error"): void;
  clear(): void;
}

declare class DialogProvider extends Component {
  fullWidth: boolean;
  maxWidth: "extra-small" | "small" | "medium" | "large";
}

declare class SnackbarProvider extends Component {
  maxDisplayed: number;
}

declare class ActionButton extends Component {
  label: string;
  variant: "text" | "outlined" | "filled";
  disabled: boolean;
  onClick: ((event: UiEvent) => void) | undefined;
}

declare class TextField extends Component {
  label: string;
  value: string;
  onChange: ((value: string) => void) | undefined;
}

declare class Card extends Component {
  title: string;
  elevation: number;
}

declare const console: {
  log(...data: unknown[]): void;
  warn(...data: unknown[]): void;
  error(...data: unknown[]): void;
};
`;
