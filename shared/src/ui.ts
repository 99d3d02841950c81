/**
 * Builders for the host's settings forms and detail pages.
 * The host renders these as a Vue component tree.
 */

export interface UiNode {
  component: string;
  props?: Record<string, unknown>;
  text?: string;
  content?: UiNode[];
}

export type AlertType = 'info' | 'success' | 'warning' | 'error';

export function form(...rows: UiNode[]): UiNode {
  return { component: 'VForm', content: rows };
}

export function row(...cols: UiNode[]): UiNode {
  return { component: 'VRow', content: cols };
}

export function col(width: { cols?: number; md?: number }, ...content: UiNode[]): UiNode {
  return { component: 'VCol', props: { cols: width.cols ?? 12, ...(width.md ? { md: width.md } : {}) }, content };
}

export function switchField(model: string, label: string, hint?: string): UiNode {
  return {
    component: 'VSwitch',
    props: {
      model,
      label,
      ...(hint ? { hint, 'persistent-hint': true } : {}),
    },
  };
}

export interface TextFieldOptions {
  placeholder?: string;
  hint?: string;
  secret?: boolean;
}

export function textField(model: string, label: string, options: TextFieldOptions = {}): UiNode {
  const props: Record<string, unknown> = { model, label };
  if (options.placeholder !== undefined) props.placeholder = options.placeholder;
  if (options.hint) {
    props.hint = options.hint;
    props['persistent-hint'] = true;
  }
  if (options.secret) {
    props.type = 'password';
    props['append-inner-icon'] = 'mdi-eye-off';
  }
  return { component: 'VTextField', props };
}

export function alert(type: AlertType, text: string): UiNode {
  return { component: 'VAlert', props: { type, variant: 'tonal', text } };
}

export function table(headers: string[], rows: string[][]): UiNode {
  return {
    component: 'VTable',
    props: { hover: true },
    content: [
      {
        component: 'thead',
        content: [{
          component: 'tr',
          content: headers.map(text => ({ component: 'th', props: { class: 'text-start ps-4' }, text })),
        }],
      },
      {
        component: 'tbody',
        content: rows.map(cells => ({
          component: 'tr',
          content: cells.map(text => ({ component: 'td', text })),
        })),
      },
    ],
  };
}

/** Local time as `YYYY-MM-DD HH:mm:ss` */
export function formatDateTime(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} `
    + `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}
