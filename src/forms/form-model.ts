// Form model: forms and their controls, current values, and submission
// request construction (application/x-www-form-urlencoded).

import type { DomTree, ElementNode, NodeHandle } from '../html/dom.js';
import { getLogger } from '../logging.js';

const logger = getLogger('Forms');

export type ControlType =
  | 'text'
  | 'password'
  | 'hidden'
  | 'checkbox'
  | 'radio'
  | 'submit'
  | 'reset'
  | 'button'
  | 'image'
  | 'file'
  | 'textarea'
  | 'select';

export type FormMethod = 'GET' | 'POST';

export interface SelectOption {
  label: string;
  value: string;
  disabled: boolean;
}

export interface FormControl {
  node: NodeHandle;
  type: ControlType;
  /** Empty when the control has no name */
  name: string;
  /** Index of the owning form, or null for controls outside any form */
  form: number | null;
  disabled: boolean;
  readOnly: boolean;
  defaultValue: string;
  value: string;
  defaultChecked: boolean;
  checked: boolean;
  options: SelectOption[];
  multiple: boolean;
  defaultSelected: number[];
  selected: number[];
  /** Visible width in characters for text fields, columns for textareas */
  size: number;
  /** Visible rows for textareas */
  rows: number;
  /** Label of buttons */
  label: string;
  /** `formaction` / `formmethod` overrides on submit buttons */
  formAction: string | null;
  formMethod: FormMethod | null;
}

export interface Form {
  index: number;
  node: NodeHandle;
  method: FormMethod;
  /** Raw action attribute; empty means the document URL */
  action: string;
  /** Control nodes in tree order */
  controls: NodeHandle[];
}

export interface FormEntry {
  name: string;
  value: string;
  type: ControlType;
}

export interface FormSubmission {
  method: FormMethod;
  url: string;
  /** Encoded entries for POST; null for GET */
  body: string | null;
  contentType: string | null;
}

export type SubmissionResult =
  | { ok: true; submission: FormSubmission }
  | { ok: false; error: string };

export const FORM_URLENCODED = 'application/x-www-form-urlencoded';

const TEXT_INPUT_TYPES = new Set([
  'text', 'search', 'email', 'url', 'tel', 'number', 'range', 'date', 'datetime-local',
  'month', 'week', 'time', 'color',
]);

const INPUT_TYPES: Record<string, ControlType> = {
  password: 'password',
  hidden: 'hidden',
  checkbox: 'checkbox',
  radio: 'radio',
  submit: 'submit',
  reset: 'reset',
  button: 'button',
  image: 'image',
  file: 'file',
};

const BUTTON_TYPES = new Set<ControlType>(['submit', 'reset', 'button', 'image', 'file']);

const DEFAULT_INPUT_SIZE = 20;
const DEFAULT_TEXTAREA_COLS = 20;
const DEFAULT_TEXTAREA_ROWS = 2;

function collapse(text: string): string {
  return text.replace(/[ \t\n\r\f]+/g, ' ').trim();
}

function positiveInt(value: string | undefined, fallback: number): number {
  const parsed = value === undefined ? NaN : Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function parseMethod(value: string | undefined): FormMethod | null {
  const method = value?.trim().toLowerCase();
  if (method === 'post') return 'POST';
  if (method === 'get') return 'GET';
  return null;
}

/**
 * Control type of an element, or null if it is not a form control.
 */
export function controlTypeOf(element: ElementNode): ControlType | null {
  const attr = (name: string) => element.attributes.find(a => a.name === name)?.value;
  switch (element.tagName) {
    case 'textarea':
      return 'textarea';
    case 'select':
      return 'select';
    case 'button': {
      const type = attr('type')?.toLowerCase();
      return type === 'reset' || type === 'button' ? type : 'submit';
    }
    case 'input': {
      const type = (attr('type') ?? 'text').trim().toLowerCase();
      if (TEXT_INPUT_TYPES.has(type)) return 'text';
      return Object.hasOwn(INPUT_TYPES, type) ? INPUT_TYPES[type] : 'text';
    }
    default:
      return null;
  }
}

/** Visible label of a button-like control */
export function buttonLabel(tree: DomTree, element: ElementNode, type: ControlType): string {
  if (element.tagName === 'button') return collapse(tree.textContent(element.handle));
  const value = tree.getAttribute(element.handle, 'value');
  switch (type) {
    case 'submit':
      return value ?? 'Submit';
    case 'reset':
      return value ?? 'Reset';
    case 'image':
      return tree.getAttribute(element.handle, 'alt') ?? 'Submit';
    case 'file':
      return 'Browse…';
    default:
      return value ?? '';
  }
}

export function isTextControl(type: ControlType): boolean {
  return type === 'text' || type === 'password' || type === 'textarea';
}

export function isButtonControl(type: ControlType): boolean {
  return BUTTON_TYPES.has(type);
}

/**
 * Percent-encode a form name or value. Everything outside the unreserved set
 * is escaped; a space becomes `%20`.
 */
export function encodeFormComponent(text: string): string {
  return encodeURIComponent(text).replace(/[!'()*]/g, c => `%${c.charCodeAt(0).toString(16).toUpperCase()}`);
}

export function encodeEntries(entries: readonly FormEntry[]): string {
  return entries.map(entry => `${encodeFormComponent(entry.name)}=${encodeFormComponent(entry.value)}`).join('&');
}

export class FormModel {
  private readonly _forms: Form[] = [];
  private readonly _controls = new Map<NodeHandle, FormControl>();

  private constructor() {}

  /**
   * Collect forms and controls. Controls belong to the form named by their
   * `form` attribute, else to the nearest ancestor form.
   */
  static fromDocument(tree: DomTree, root: NodeHandle): FormModel {
    const model = new FormModel();
    const formsById = new Map<string, number>();
    const formByNode = new Map<NodeHandle, number>();

    for (const node of tree.descendants(root)) {
      if (node.kind !== 'element' || node.tagName !== 'form') continue;
      const index = model._forms.length;
      model._forms.push({
        index,
        node: node.handle,
        method: parseMethod(tree.getAttribute(node.handle, 'method')) ?? 'GET',
        action: tree.getAttribute(node.handle, 'action')?.trim() ?? '',
        controls: [],
      });
      formByNode.set(node.handle, index);
      const id = tree.getAttribute(node.handle, 'id');
      if (id !== undefined && !formsById.has(id)) formsById.set(id, index);
    }

    for (const node of tree.descendants(root)) {
      if (node.kind !== 'element') continue;
      const type = controlTypeOf(node);
      if (type === null) continue;

      const formAttr = tree.getAttribute(node.handle, 'form');
      let form: number | null = formAttr !== undefined ? formsById.get(formAttr) ?? null : null;
      let disabled = tree.hasAttribute(node.handle, 'disabled');
      for (let ancestor = tree.parentElement(node.handle); ancestor; ancestor = tree.parentElement(ancestor.handle)) {
        if (form === null && formAttr === undefined && ancestor.tagName === 'form') {
          form = formByNode.get(ancestor.handle) ?? null;
        }
        if (ancestor.tagName === 'fieldset' && tree.hasAttribute(ancestor.handle, 'disabled')) disabled = true;
      }

      const control = FormModel._createControl(tree, node, type, form, disabled);
      model._controls.set(node.handle, control);
      if (form !== null) model._forms[form].controls.push(node.handle);
    }

    model._normalizeRadioGroups();
    logger.debug('Collected forms', { forms: model._forms.length, controls: model._controls.size });
    return model;
  }

  private static _createControl(
    tree: DomTree,
    element: ElementNode,
    type: ControlType,
    form: number | null,
    disabled: boolean,
  ): FormControl {
    const attr = (name: string) => tree.getAttribute(element.handle, name);
    let defaultValue = attr('value') ?? '';
    let label = '';
    let options: SelectOption[] = [];
    let defaultSelected: number[] = [];
    const multiple = type === 'select' && tree.hasAttribute(element.handle, 'multiple');

    switch (type) {
      case 'textarea':
        // a newline right after the start tag is not part of the value
        defaultValue = tree.textContent(element.handle).replace(/^\r?\n/, '');
        break;
      case 'checkbox':
      case 'radio':
        defaultValue = attr('value') ?? 'on';
        break;
      case 'select': {
        const result = FormModel._collectOptions(tree, element.handle, multiple);
        options = result.options;
        defaultSelected = result.selected;
        break;
      }
      case 'submit':
      case 'reset':
      case 'button':
      case 'image':
      case 'file':
        label = buttonLabel(tree, element, type);
        // an input submit button without a value submits its default label
        if (type === 'submit' && element.tagName === 'input' && !tree.hasAttribute(element.handle, 'value')) {
          defaultValue = label;
        }
        break;
      default:
        break;
    }

    const defaultChecked = (type === 'checkbox' || type === 'radio') && tree.hasAttribute(element.handle, 'checked');
    const isTextarea = type === 'textarea';
    return {
      node: element.handle,
      type,
      name: attr('name') ?? '',
      form,
      disabled,
      readOnly: tree.hasAttribute(element.handle, 'readonly'),
      defaultValue,
      value: defaultValue,
      defaultChecked,
      checked: defaultChecked,
      options,
      multiple,
      defaultSelected,
      selected: [...defaultSelected],
      size: isTextarea ? positiveInt(attr('cols'), DEFAULT_TEXTAREA_COLS) : positiveInt(attr('size'), DEFAULT_INPUT_SIZE),
      rows: isTextarea ? positiveInt(attr('rows'), DEFAULT_TEXTAREA_ROWS) : 1,
      label,
      formAction: attr('formaction') ?? null,
      formMethod: parseMethod(attr('formmethod')),
    };
  }

  private static _collectOptions(
    tree: DomTree,
    select: NodeHandle,
    multiple: boolean,
  ): { options: SelectOption[]; selected: number[] } {
    const options: SelectOption[] = [];
    const selected: number[] = [];
    for (const node of tree.descendants(select)) {
      if (node.kind !== 'element' || node.tagName !== 'option') continue;
      const text = collapse(tree.textContent(node.handle));
      const group = tree.parentElement(node.handle);
      const disabled = tree.hasAttribute(node.handle, 'disabled') ||
        (group?.tagName === 'optgroup' && tree.hasAttribute(group.handle, 'disabled'));
      options.push({
        label: tree.getAttribute(node.handle, 'label') ?? text,
        value: tree.getAttribute(node.handle, 'value') ?? text,
        disabled,
      });
      if (tree.hasAttribute(node.handle, 'selected')) {
        if (!multiple) selected.length = 0;
        selected.push(options.length - 1);
      }
    }
    if (!multiple && selected.length === 0) {
      const first = options.findIndex(option => !option.disabled);
      if (first >= 0) selected.push(first);
    }
    return { options, selected };
  }

  /** At most one checked radio per group: the last one in tree order wins */
  private _normalizeRadioGroups(): void {
    const seen = new Map<string, FormControl>();
    for (const control of this._controls.values()) {
      if (control.type !== 'radio' || control.name === '' || !control.checked) continue;
      const key = `${control.form ?? ''}\u0000${control.name}`;
      const previous = seen.get(key);
      if (previous) {
        previous.checked = false;
        previous.defaultChecked = false;
      }
      seen.set(key, control);
    }
  }

  get forms(): readonly Form[] {
    return this._forms;
  }

  /** Controls in tree order */
  controls(): IterableIterator<FormControl> {
    return this._controls.values();
  }

  control(node: NodeHandle): FormControl | undefined {
    return this._controls.get(node);
  }

  formOf(node: NodeHandle): Form | undefined {
    const index = this._controls.get(node)?.form;
    return index === null || index === undefined ? undefined : this._forms[index];
  }

  private _editable(node: NodeHandle): FormControl | undefined {
    const control = this._controls.get(node);
    return control && !control.disabled ? control : undefined;
  }

  /**
   * Replace the value of a text field or textarea. Returns false when the
   * control cannot be edited.
   */
  setValue(node: NodeHandle, value: string): boolean {
    const control = this._editable(node);
    if (!control || control.readOnly || !isTextControl(control.type)) return false;
    control.value = control.type === 'textarea' ? value : value.replace(/[\r\n]/g, '');
    return true;
  }

  /**
   * Flip a checkbox, or check a radio button and clear the rest of its group.
   */
  toggle(node: NodeHandle): boolean {
    const control = this._editable(node);
    if (!control) return false;
    if (control.type === 'checkbox') {
      control.checked = !control.checked;
      return true;
    }
    if (control.type === 'radio') {
      if (control.name !== '') {
        for (const other of this._controls.values()) {
          if (other.type === 'radio' && other.name === control.name && other.form === control.form) {
            other.checked = false;
          }
        }
      }
      control.checked = true;
      return true;
    }
    return false;
  }

  /**
   * Select an option. Single selects replace the selection; multiple selects
   * toggle the option.
   */
  selectOption(node: NodeHandle, index: number): boolean {
    const control = this._editable(node);
    if (!control || control.type !== 'select') return false;
    const option = control.options[index];
    if (!option || option.disabled) return false;
    if (control.multiple) {
      const at = control.selected.indexOf(index);
      if (at >= 0) control.selected.splice(at, 1);
      else control.selected = [...control.selected, index].sort((a, b) => a - b);
    } else {
      control.selected = [index];
    }
    return true;
  }

  /** Move the selection to the next enabled option, wrapping around */
  cycleOption(node: NodeHandle, delta = 1): boolean {
    const control = this._editable(node);
    if (!control || control.type !== 'select' || control.options.length === 0) return false;
    const count = control.options.length;
    let index = control.selected[0] ?? -1;
    for (let step = 0; step < count; step++) {
      index = (((index + delta) % count) + count) % count;
      if (!control.options[index].disabled) {
        control.selected = [index];
        return true;
      }
    }
    return false;
  }

  /** Restore every control of the form to its default */
  reset(formIndex: number): void {
    const form = this._forms[formIndex];
    if (!form) return;
    for (const node of form.controls) {
      const control = this._controls.get(node);
      if (!control) continue;
      control.value = control.defaultValue;
      control.checked = control.defaultChecked;
      control.selected = [...control.defaultSelected];
    }
  }

  /** First enabled submit button of the form, used for implicit submission */
  defaultButton(formIndex: number): NodeHandle | null {
    const form = this._forms[formIndex];
    if (!form) return null;
    for (const node of form.controls) {
      const control = this._controls.get(node);
      if (control && (control.type === 'submit' || control.type === 'image') && !control.disabled) return node;
    }
    return null;
  }

  /**
   * The form data set: (name, value, type) for each successful control in
   * tree order. Only the submitter contributes among buttons.
   */
  entries(formIndex: number, submitter: NodeHandle | null = null): FormEntry[] {
    const form = this._forms[formIndex];
    if (!form) return [];
    const entries: FormEntry[] = [];
    for (const node of form.controls) {
      const control = this._controls.get(node);
      if (!control || control.disabled || control.name === '') continue;
      const push = (name: string, value: string) => entries.push({ name, value, type: control.type });
      switch (control.type) {
        case 'submit':
          if (node === submitter) push(control.name, control.defaultValue);
          break;
        case 'image':
          if (node === submitter) {
            push(`${control.name}.x`, '0');
            push(`${control.name}.y`, '0');
          }
          break;
        case 'reset':
        case 'button':
        case 'file':
          break;
        case 'checkbox':
        case 'radio':
          if (control.checked) push(control.name, control.value);
          break;
        case 'select':
          for (const index of control.selected) {
            const option = control.options[index];
            if (option) push(control.name, option.value);
          }
          break;
        case 'textarea':
          push(control.name, control.value.replace(/\r?\n/g, '\r\n'));
          break;
        case 'text':
        case 'password':
        case 'hidden':
          push(control.name, control.value);
          break;
      }
    }
    return entries;
  }

  /**
   * Build the request for submitting a form. The action is resolved against
   * `baseUrl`; GET replaces the query of the action URL, POST sends the
   * encoded entries as the body.
   */
  buildSubmission(formIndex: number, baseUrl: string, submitter: NodeHandle | null = null): SubmissionResult {
    const form = this._forms[formIndex];
    if (!form) return { ok: false, error: `No form #${formIndex}` };

    const button = submitter === null ? undefined : this._controls.get(submitter);
    const action = button?.formAction ?? form.action;
    const method = button?.formMethod ?? form.method;

    let url: URL;
    try {
      url = new URL(action, baseUrl);
    } catch {
      return { ok: false, error: `Invalid form action: ${action || baseUrl}` };
    }

    const encoded = encodeEntries(this.entries(formIndex, submitter));
    logger.debug('Form submission', { method, action: url.href });
    if (method === 'GET') {
      url.search = encoded === '' ? '' : `?${encoded}`;
      return { ok: true, submission: { method, url: url.href, body: null, contentType: null } };
    }
    return { ok: true, submission: { method, url: url.href, body: encoded, contentType: FORM_URLENCODED } };
  }
}
