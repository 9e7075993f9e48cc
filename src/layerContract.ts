/**
 * Copyright (c) 2025 Rowan Cardow
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

/**
 * @fileoverview Rules that bring a translation layer in line with the
 * BaseTranslationLayer contract: description/priority accessors, the
 * `(String text, TranslationContext context)` signatures, deferred
 * LayerDebugInfo construction and the new `_createResult` protocol.
 * @module layerContract
 */

import { BlockReplacer } from "./blockReplacer.js";
import { PatternRuleSet } from "./patternRuleSet.js";
import { RewriteEngine } from "./rewriteEngine.js";
import type { BlockSpec, RewriteRule } from "./types/rewrite.js";

export const LAYER_CONTRACT_RULES: readonly RewriteRule[] = Object.freeze([
  {
    id: "strip-translation-result-import",
    description: "Remove the unused translation_result import",
    matcher: "import '../models/translation_result.dart';\n",
    template: "",
  },
  {
    id: "strip-exceptions-import",
    description: "Remove the unused exceptions import",
    matcher: "import '../utils/exceptions.dart';\n",
    template: "",
  },
  {
    id: "insert-description-accessor",
    description:
      "Add the description accessor and type the priority accessor after the name accessor",
    matcher:
      "@override\n  String get name => layerName;\n\n  @override\n  int get priority => layerPriority;",
    template: [
      "@override",
      "  String get name => layerName;",
      "",
      "  @override",
      "  String get description => '{{description}}';",
      "",
      "  @override",
      "  LayerPriority get priority => LayerPriority.{{priorityLabel}};",
    ].join("\n"),
  },
  {
    id: "can-handle-signature",
    description: "Take the subject text ahead of the context in canHandle",
    matcher: "bool canHandle(TranslationContext context)",
    template: "bool canHandle(String text, TranslationContext context)",
  },
  {
    id: "process-signature",
    description: "Take the subject text ahead of the context in process",
    matcher: "Future<LayerResult> process(TranslationContext context)",
    template: "Future<LayerResult> process(String text, TranslationContext context)",
  },
  {
    id: "defer-debug-info",
    description:
      "Capture the start time instead of building LayerDebugInfo before work begins",
    matcher:
      /final debugInfo = LayerDebugInfo\(\s*layerName: name,\s*startTime: DateTime\.now\(\),\s*\);/,
    template: "final startTime = DateTime.now();",
    multiline: true,
  },
  {
    id: "current-text-fallback",
    description: "Fall back to the subject text when nothing is translated yet",
    matcher: "String currentText = context.translatedText ?? '';",
    template: "String currentText = context.translatedText ?? text;",
  },
  {
    id: "create-result-call-shape",
    description:
      "Move _createResult calls to (text, flag, stopwatch, startTime, message)",
    matcher:
      /return _createResult\((true|false), context, stopwatch, debugInfo, '((?:[^'\\\n]|\\.)*)'\);/,
    template: "return _createResult(text, $1, stopwatch, startTime, '$2');",
  },
  {
    id: "comment-debug-details",
    description:
      "Turn debugInfo.details writes into comments; the data now travels in additionalInfo",
    matcher: /debugInfo\.details\['([^'\n]+)'\] = ([^;\n]+);/,
    template: "// $1: $2 (moved to additionalInfo)",
  },
]);

const CREATE_RESULT_TEMPLATE = `LayerResult _createResult(
    String processedText,
    bool success,
    Stopwatch stopwatch,
    DateTime startTime,
    [String? error,
    Map<String, dynamic>? additionalInfo]
  ) {
    stopwatch.stop();

    final debugInfo = LayerDebugInfo(
      layerName: name,
      processingTimeMs: stopwatch.elapsedMilliseconds,
      isSuccessful: success,
      hasError: error != null,
      errorMessage: error,
      additionalInfo: additionalInfo ?? {},
    );

    if (success) {
      return LayerResult.success(
        processedText: processedText,
        debugInfo: debugInfo,
      );
    } else {
      return LayerResult.error(
        originalText: processedText,
        errorMessage: error ?? 'Unknown error',
        debugInfo: debugInfo,
      );
    }
  }`;

export const CREATE_RESULT_BLOCK: Readonly<BlockSpec> = Object.freeze({
  id: "create-result-builder",
  description:
    "Replace _createResult with the builder that assembles LayerDebugInfo on completion",
  openMatcher: /LayerResult _createResult\(/,
  delimiters: Object.freeze({ open: "{", close: "}" }),
  groupDelimiters: Object.freeze({ open: "(", close: ")" }),
  newBlockTemplate: CREATE_RESULT_TEMPLATE,
});

/**
 * Engine preloaded with the layer contract rules and builder block
 */
export function createLayerContractEngine(): RewriteEngine {
  return new RewriteEngine(
    new PatternRuleSet(LAYER_CONTRACT_RULES),
    new BlockReplacer(CREATE_RESULT_BLOCK),
  );
}
