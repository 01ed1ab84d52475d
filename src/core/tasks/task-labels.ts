/**
 * Task label wording. Labels are written in the progressive form
 * ("Downloading x") and turned into outcome messages after the task ends.
 */

interface VerbForm {
  progressive: string;
  past: string;
  base: string;
}

const VERB_FORMS: VerbForm[] = [
  { progressive: 'Downloading ', past: 'downloaded ', base: 'download ' },
  { progressive: 'Unzipping ', past: 'unzipped ', base: 'unzip ' },
  { progressive: 'Installing ', past: 'installed ', base: 'install ' },
  { progressive: 'Searching for ', past: 'found ', base: 'find ' },
  { progressive: 'Updating ', past: 'updated ', base: 'update ' }
];

function rewrite(label: string, pick: (form: VerbForm) => string): string {
  return VERB_FORMS.reduce((text, form) => text.replace(form.progressive, pick(form)), label);
}

export function toPastTense(label: string): string {
  return rewrite(label, form => form.past);
}

export function toImperative(label: string): string {
  return rewrite(label, form => form.base);
}

export function successMessage(label: string): string {
  return `Successfully ${toPastTense(label)}`;
}

export function failureMessage(label: string, logFile: string): string {
  return `Failed to ${toImperative(label)}. Check the log file: ${logFile}`;
}
