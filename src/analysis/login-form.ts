import { isTag } from 'domhandler';
import type { AnyNode, Element } from 'domhandler';

import {
  collect,
  elementMatcher,
  findFirst,
  getAttribute,
  some,
  tagNameOf,
  textContent,
} from './tree-walker.js';

// Substring vocabularies. Matching is deliberately loose: lowercase
// `includes`, no word boundaries.
const FORM_ATTRIBUTE_PATTERNS = [
  'login',
  'signin',
  'sign_in',
  'sign-in',
  'authenticate',
  'auth',
  'authentication',
  'logon',
  'signon',
  'sign_on',
  'sign-on',
] as const;

const FORM_IDENTITY_ATTRIBUTES = ['action', 'id', 'name', 'class'] as const;

const FORM_AUTH_MARKER_ATTRIBUTES = ['data-auth', 'data-login'] as const;

const LOGIN_AUTOCOMPLETE_VALUES = [
  'username',
  'current-password',
  'new-password',
] as const;

const LOGIN_PHRASES = [
  'sign in to',
  'log in to',
  'login to',
  'welcome back',
  'welcome to',
  'enter your',
  'provide your',
  'access your account',
  'access account',
  'your credentials',
  'your password',
  'authentication required',
  'login required',
] as const;

const LOGIN_FIELD_LABELS = [
  'username',
  'user id',
  'userid',
  'user-id',
  'email address',
  'email addr',
  'e-mail',
  'password',
  'passwd',
  'pass word',
  'pass-word',
] as const;

const SUBMIT_VOCABULARY = [
  'login',
  'sign in',
  'signin',
  'log in',
  'authenticate',
  'continue',
  'submit',
  'enter',
  'access',
  'proceed',
] as const;

const LOGIN_FIELD_KEYWORDS = [
  'username',
  'userid',
  'user_id',
  'user-name',
  'password',
  'passwd',
  'pass_word',
  'pass-word',
  'login',
  'email',
] as const;

export interface LoginSignals {
  /** action/id/name/class of the form carries a login pattern */
  formAttributes: boolean;
  /** autocomplete hint or data-auth/data-login marker */
  authAttributes: boolean;
  /** login phrase or field label in the form text */
  loginText: boolean;
  /** a submit control labelled with login vocabulary */
  submitControl: boolean;
  /** an input named or id'd like a credential field */
  fieldNames: boolean;
}

export interface LoginFormAssessment {
  hasPasswordField: boolean;
  signals: LoginSignals;
  isLoginForm: boolean;
}

const isForm = elementMatcher('form');
const isInput = elementMatcher('input');

function containsAny(value: string | undefined, needles: readonly string[]): boolean {
  if (!value) return false;
  const haystack = value.toLowerCase();
  return needles.some((needle) => haystack.includes(needle));
}

function attributeEquals(element: Element, name: string, expected: string): boolean {
  return getAttribute(element, name)?.trim().toLowerCase() === expected;
}

function isPasswordInput(node: AnyNode): boolean {
  return isInput(node) && attributeEquals(node, 'type', 'password');
}

function hasLoginFormAttributes(form: Element): boolean {
  return FORM_IDENTITY_ATTRIBUTES.some((name) =>
    containsAny(getAttribute(form, name), FORM_ATTRIBUTE_PATTERNS)
  );
}

function hasAuthAttributes(form: Element): boolean {
  const hasMarker = FORM_AUTH_MARKER_ATTRIBUTES.some(
    (name) => getAttribute(form, name) !== undefined
  );
  if (hasMarker) return true;

  return some(
    form,
    (node) =>
      isTag(node) &&
      containsAny(getAttribute(node, 'autocomplete'), LOGIN_AUTOCOMPLETE_VALUES)
  );
}

function hasLoginText(form: Element): boolean {
  const text = textContent(form);
  return (
    containsAny(text, LOGIN_PHRASES) || containsAny(text, LOGIN_FIELD_LABELS)
  );
}

function isSubmitControl(node: AnyNode): node is Element {
  if (!isTag(node)) return false;
  const tagName = node.name.toLowerCase();

  if (tagName === 'input') return attributeEquals(node, 'type', 'submit');
  if (tagName !== 'button') return false;

  // A button with no type attribute submits its form.
  const type = getAttribute(node, 'type');
  return type === undefined || type.trim().toLowerCase() === 'submit';
}

function submitLabel(control: Element): string {
  if (tagNameOf(control) === 'input') return getAttribute(control, 'value') ?? '';
  return textContent(control);
}

function hasLoginSubmitControl(form: Element): boolean {
  return collect(form, isSubmitControl).some((control) =>
    containsAny(submitLabel(control), SUBMIT_VOCABULARY)
  );
}

function hasLoginFieldNames(form: Element): boolean {
  return collect(form, isInput).some(
    (input) =>
      containsAny(getAttribute(input, 'name'), LOGIN_FIELD_KEYWORDS) ||
      containsAny(getAttribute(input, 'id'), LOGIN_FIELD_KEYWORDS)
  );
}

/**
 * Scores one form. A password field is required; one more signal of any
 * kind confirms it.
 */
export function assessLoginForm(form: Element): LoginFormAssessment {
  const hasPasswordField = some(form, isPasswordInput);

  const signals: LoginSignals = {
    formAttributes: hasLoginFormAttributes(form),
    authAttributes: hasAuthAttributes(form),
    loginText: hasLoginText(form),
    submitControl: hasLoginSubmitControl(form),
    fieldNames: hasLoginFieldNames(form),
  };

  const corroborated = Object.values(signals).some(Boolean);

  return {
    hasPasswordField,
    signals,
    isLoginForm: hasPasswordField && corroborated,
  };
}

export function isLoginForm(form: Element): boolean {
  return assessLoginForm(form).isLoginForm;
}

export function findLoginForm(root: AnyNode): Element | undefined {
  return findFirst(root, (node): node is Element => isForm(node) && isLoginForm(node));
}

export function hasLoginForm(root: AnyNode): boolean {
  return findLoginForm(root) !== undefined;
}
