import yaml from 'js-yaml';
import path from 'node:path';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import type { TranslateOptions } from '../src/exposed-types';

const testDir = path.dirname(fileURLToPath(import.meta.url));

export interface TestCase {
  title: string;
  mathcad: string;
  latex: string;
  options?: Partial<TranslateOptions>;
};


export interface TestCaseFile {
    title: string;
    cases: TestCase[];
};


export function loadTestCases(filename: string): TestCaseFile {
    const content = fs.readFileSync(path.join(testDir, filename), { encoding: 'utf-8' });
    return yaml.load(content) as TestCaseFile;
}

export function readFixture(filename: string): string {
    return fs.readFileSync(path.join(testDir, filename), { encoding: 'utf-8' });
}
