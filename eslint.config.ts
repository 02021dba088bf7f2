// ==============================================================================
// ESLINT FLAT CONFIG
// Plugin presets with minimal overrides for the climate report CLI.
// ==============================================================================

import stylistic from '@stylistic/eslint-plugin'
import importX from 'eslint-plugin-import-x'
import jsdoc from 'eslint-plugin-jsdoc'
import sonarjs from 'eslint-plugin-sonarjs'
import tseslint from 'typescript-eslint'

import type { Linter } from 'eslint'

type Rules = Linter.RulesRecord

// ----------------------------------------------------------
// STYLISTIC CONFIG (customize preset)
// ----------------------------------------------------------

const sourceStyle = stylistic.configs.customize({
  indent: 2, quotes: 'single', semi: true, commaDangle: 'only-multiline', braceStyle: '1tbs',
})

const configStyle = stylistic.configs.customize({
  indent: 2, quotes: 'single', semi: false, commaDangle: 'always-multiline', braceStyle: '1tbs',
})

// ----------------------------------------------------------
// RULE SETS
// ----------------------------------------------------------

const stylisticOverrides: Rules = {
  '@stylistic/no-multi-spaces': ['error', { ignoreEOLComments: true }],
  '@stylistic/quote-props': 'off',
  '@stylistic/arrow-parens': 'off',
  '@stylistic/max-statements-per-line': 'off',
  '@stylistic/indent-binary-ops': 'off',
  '@stylistic/padded-blocks': 'off',
  '@stylistic/operator-linebreak': 'off',
  '@stylistic/multiline-ternary': 'off',
}

const sourceRules: Rules = {
  'no-use-before-define': ['error', { functions: false, classes: true, variables: true }],
  'max-depth': ['warn', 4],
  'max-nested-callbacks': ['warn', 3],
  'max-lines-per-function': ['warn', { max: 100, skipBlankLines: true, skipComments: true }],
  'max-params': ['warn', 5],
}

const jsdocRules: Rules = {
  'jsdoc/check-syntax': 'error',
  'jsdoc/valid-types': 'error',
  'jsdoc/check-param-names': 'error',
  'jsdoc/check-tag-names': ['error', { definedTags: ['category', 'internal'] }],
  'jsdoc/require-returns': 'off',
  'jsdoc/require-param-description': 'warn',
  'jsdoc/require-returns-description': 'off',
  'jsdoc/check-alignment': 'error',
  'jsdoc/empty-tags': 'error',
  'jsdoc/no-undefined-types': 'off',
}

const qualityRules: Rules = {
  'eqeqeq': ['error', 'always', { null: 'ignore' }],
  'no-var': 'error',
  'no-console': 'off',
  'no-constant-condition': ['error', { checkLoops: false }],
  'no-empty': 'error',
  'no-throw-literal': 'error',
  'complexity': ['warn', 15],
  'sonarjs/cognitive-complexity': ['warn', 15],
  'sonarjs/no-identical-functions': 'warn',
  'sonarjs/no-duplicated-branches': 'error',
  'sonarjs/no-collapsible-if': 'warn',
  'sonarjs/no-redundant-jump': 'error',
  'sonarjs/no-same-line-conditional': 'error',
  'sonarjs/no-collection-size-mischeck': 'error',
  'sonarjs/prefer-single-boolean-return': 'warn',
  'sonarjs/no-small-switch': 'warn',
  'sonarjs/no-all-duplicated-branches': 'error',
}

const tsRules: Rules = {
  '@typescript-eslint/no-unused-vars': ['error', { argsIgnorePattern: '^_', varsIgnorePattern: '^_', caughtErrorsIgnorePattern: '^_' }],
  '@typescript-eslint/no-explicit-any': 'error',
  '@typescript-eslint/no-floating-promises': 'error',
  '@typescript-eslint/consistent-type-imports': 'error',
}

const importRules: Rules = {
  'import-x/no-duplicates': 'error',
  'import-x/first': 'error',
  'import-x/newline-after-import': 'error',
}

const configImportRules: Rules = {
  'import-x/order': ['error', {
    'groups': ['builtin', 'external', 'internal', ['parent', 'sibling', 'index'], 'type'],
    'newlines-between': 'always',
    'alphabetize': { order: 'asc', caseInsensitive: true },
  }],
}

// Disable rules for tests
const relaxedRules: Rules = {
  'max-depth': 'off', 'max-nested-callbacks': 'off', 'max-lines-per-function': 'off',
  'max-params': 'off', 'complexity': 'off',
  'sonarjs/cognitive-complexity': 'off', 'sonarjs/no-identical-functions': 'off',
  'sonarjs/no-collapsible-if': 'off', 'sonarjs/no-duplicated-branches': 'off',
}

const typedParser = {
  parser: tseslint.parser,
  parserOptions: { project: ['./tsconfig.json'], ecmaVersion: 2022, sourceType: 'module' },
} as const

// ==============================================================================
// MAIN CONFIG
// ==============================================================================

export default tseslint.config(
  { ignores: ['node_modules/**', 'dist/**', 'coverage/**'] },

  // SOURCE FILES
  {
    files: ['src/**/*.ts'],
    ignores: ['src/**/*.test.ts', 'src/test-utils/**'],
    languageOptions: typedParser,
    plugins: { '@stylistic': stylistic, '@typescript-eslint': tseslint.plugin, 'import-x': importX, 'jsdoc': jsdoc, 'sonarjs': sonarjs },
    rules: { ...sourceStyle.rules, ...stylisticOverrides, ...sourceRules, ...jsdocRules, ...qualityRules, ...tsRules, ...importRules },
  },

  // TEST FILES
  {
    files: ['src/**/*.test.ts', 'src/test-utils/**/*.ts'],
    languageOptions: typedParser,
    plugins: { '@stylistic': stylistic, '@typescript-eslint': tseslint.plugin, 'import-x': importX, 'sonarjs': sonarjs },
    rules: { ...sourceStyle.rules, ...stylisticOverrides, ...qualityRules, ...tsRules, ...importRules, ...relaxedRules },
  },

  // CONFIG FILES
  {
    files: ['*.config.ts'],
    languageOptions: {
      parser: tseslint.parser,
      parserOptions: { project: null, ecmaVersion: 2022, sourceType: 'module' },
    },
    plugins: { '@stylistic': stylistic, '@typescript-eslint': tseslint.plugin, 'import-x': importX },
    rules: { ...configStyle.rules, ...stylisticOverrides, ...configImportRules, '@typescript-eslint/no-unused-vars': 'off' },
  },
)
