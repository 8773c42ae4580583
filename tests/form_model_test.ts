// Tests for the form model: control collection, state changes and
// submission encoding

import { test } from 'node:test';
import assert from 'node:assert/strict';
import {
  controlTypeOf,
  encodeFormComponent,
  FORM_URLENCODED,
  FormModel,
  parseHtml,
  type DomTree,
  type NodeHandle,
} from '../mod.js';

const BASE = 'http://example.test/index.html';

function load(html: string): { tree: DomTree; model: FormModel; byName: (name: string, nth?: number) => NodeHandle } {
  const { tree, root } = parseHtml(html);
  const model = FormModel.fromDocument(tree, root);
  const byName = (name: string, nth = 0): NodeHandle => {
    const matches = [...model.controls()].filter(control => control.name === name);
    const control = matches[nth];
    assert.ok(control, `no control named ${name}`);
    return control.node;
  };
  return { tree, model, byName };
}

test('buildSubmission - GET encodes entries into the query', () => {
  const { model } = load('<form action="/search" method="get"><input name="q" value="hello world"><input type="submit" value="Go"></form>');
  assert.deepEqual(model.buildSubmission(0, BASE), {
    ok: true,
    submission: { method: 'GET', url: 'http://example.test/search?q=hello%20world', body: null, contentType: null },
  });
});

test('buildSubmission - edited value replaces the default', () => {
  const { model, byName } = load('<form action="/search"><input name="q"></form>');
  assert.equal(model.setValue(byName('q'), 'hello world'), true);
  const result = model.buildSubmission(0, BASE);
  assert.ok(result.ok);
  if (result.ok) assert.equal(result.submission.url, 'http://example.test/search?q=hello%20world');
});

test('buildSubmission - POST sends an urlencoded body', () => {
  const { model } = load(
    '<form method=post action="/login"><input name=user value="a b"><input type=password name=pw value="x&amp;y">' +
      '<textarea name=msg>line1\nline2</textarea></form>',
  );
  assert.deepEqual(model.buildSubmission(0, BASE), {
    ok: true,
    submission: {
      method: 'POST',
      url: 'http://example.test/login',
      body: 'user=a%20b&pw=x%26y&msg=line1%0D%0Aline2',
      contentType: FORM_URLENCODED,
    },
  });
});

test('buildSubmission - empty action submits to the document', () => {
  const { model } = load('<form><input name=a value=1></form>');
  const result = model.buildSubmission(0, 'http://example.test/page?old=1');
  assert.ok(result.ok);
  if (result.ok) assert.equal(result.submission.url, 'http://example.test/page?a=1');
});

test('buildSubmission - submitter name and overrides', () => {
  const { model, byName } = load(
    '<form action="/go"><input name=q value=x><button name=action value=save>Save</button>' +
      '<input type=submit name=action value=delete formmethod=post formaction="/del"></form>',
  );
  const save = model.buildSubmission(0, BASE, byName('action', 0));
  assert.ok(save.ok);
  if (save.ok) assert.equal(save.submission.url, 'http://example.test/go?q=x&action=save');

  const del = model.buildSubmission(0, BASE, byName('action', 1));
  assert.deepEqual(del, {
    ok: true,
    submission: { method: 'POST', url: 'http://example.test/del', body: 'q=x&action=delete', contentType: FORM_URLENCODED },
  });
});

test('buildSubmission - a submit input without a value sends its default label', () => {
  const { model, byName } = load('<form action="/go"><input type=submit name=a><button name=b>Press</button></form>');
  const input = model.buildSubmission(0, BASE, byName('a'));
  assert.ok(input.ok);
  if (input.ok) assert.equal(input.submission.url, 'http://example.test/go?a=Submit');

  const button = model.buildSubmission(0, BASE, byName('b'));
  assert.ok(button.ok);
  if (button.ok) assert.equal(button.submission.url, 'http://example.test/go?b=');
});

test('buildSubmission - errors', () => {
  const { model } = load('<form action="/x"></form>');
  assert.deepEqual(model.buildSubmission(3, BASE), { ok: false, error: 'No form #3' });
  assert.deepEqual(model.buildSubmission(0, 'about:blank'), { ok: false, error: 'Invalid form action: /x' });
});

test('checkboxes and radio groups', () => {
  const { model, byName } = load(
    '<form><input type=checkbox name=a checked><input type=checkbox name=b value=yes>' +
      '<input type=radio name=r value=1 checked><input type=radio name=r value=2 checked></form>',
  );
  assert.deepEqual(model.entries(0).map(e => `${e.name}=${e.value}`), ['a=on', 'r=2']);

  assert.equal(model.toggle(byName('b')), true);
  assert.equal(model.toggle(byName('r', 0)), true);
  assert.deepEqual(model.entries(0).map(e => `${e.name}=${e.value}`), ['a=on', 'b=yes', 'r=1']);

  model.reset(0);
  assert.deepEqual(model.entries(0).map(e => `${e.name}=${e.value}`), ['a=on', 'r=2']);
});

test('select - single selection and cycling skips disabled options', () => {
  const { model, byName } = load('<form><select name=s><option>One<option value=2 selected>Two<option disabled>Three</select></form>');
  const select = byName('s');
  const control = model.control(select);
  assert.ok(control);
  assert.deepEqual(control.options, [
    { label: 'One', value: 'One', disabled: false },
    { label: 'Two', value: '2', disabled: false },
    { label: 'Three', value: 'Three', disabled: true },
  ]);
  assert.deepEqual(control.selected, [1]);

  assert.equal(model.cycleOption(select), true);
  assert.deepEqual(model.control(select)?.selected, [0]);
  assert.equal(model.selectOption(select, 2), false);
  assert.deepEqual(model.entries(0).map(e => `${e.name}=${e.value}`), ['s=One']);
});

test('select - multiple selection toggles options', () => {
  const { model, byName } = load('<form><select name=m multiple><option selected>a<option>b<option selected>c</select></form>');
  const select = byName('m');
  assert.deepEqual(model.control(select)?.selected, [0, 2]);
  model.selectOption(select, 1);
  assert.deepEqual(model.control(select)?.selected, [0, 1, 2]);
  model.selectOption(select, 0);
  assert.deepEqual(model.entries(0).map(e => e.value), ['b', 'c']);
});

test('disabled controls are not submitted or edited', () => {
  const { model, byName } = load(
    '<form><input name=a value=1 disabled><fieldset disabled><input name=b value=2></fieldset>' +
      '<input name=c value=3 readonly><input name=d value=4></form>',
  );
  assert.deepEqual(model.entries(0).map(e => e.name), ['c', 'd']);
  assert.equal(model.setValue(byName('a'), 'x'), false);
  assert.equal(model.setValue(byName('c'), 'x'), false);
  assert.equal(model.setValue(byName('d'), 'one\ntwo'), true);
  assert.equal(model.control(byName('d'))?.value, 'onetwo');
});

test('form attribute associates controls outside the form', () => {
  const { model } = load('<form id=f action="/x"></form><input name=z value=1 form=f>');
  assert.equal(model.forms[0].controls.length, 1);
  const result = model.buildSubmission(0, BASE);
  assert.ok(result.ok);
  if (result.ok) assert.equal(result.submission.url, 'http://example.test/x?z=1');
});

test('defaultButton - first enabled submit button', () => {
  const { model, byName } = load('<form><input name=q><input type=submit name=one disabled><button name=two>Go</button></form>');
  assert.equal(model.defaultButton(0), byName('two'));
  assert.equal(model.control(byName('two'))?.label, 'Go');
});

test('controlTypeOf - input types', () => {
  const { tree, root } = parseHtml('<input type=email><input type=bogus><input type=CHECKBOX><button>b</button><button type=reset>r</button>');
  const types = tree.findAll(root, 'input').concat(tree.findAll(root, 'button')).map(controlTypeOf);
  assert.deepEqual(types, ['text', 'text', 'checkbox', 'submit', 'reset']);
});

test('encodeFormComponent - reserved characters are escaped', () => {
  assert.equal(encodeFormComponent("a b!*'()~"), 'a%20b%21%2A%27%28%29~');
  assert.equal(encodeFormComponent('é'), '%C3%A9');
});
