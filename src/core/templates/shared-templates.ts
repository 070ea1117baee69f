/**
 * Dart file bodies for standalone widgets, pages and providers.
 */
import type { NameForms } from '../naming/names.js';

export function widgetTemplate(n: NameForms): string {
  return `import 'package:flutter/material.dart';
import 'package:flutter_riverpod/flutter_riverpod.dart';

class ${n.pascal}Widget extends ConsumerWidget {
  const ${n.pascal}Widget({super.key});

  @override
  Widget build(BuildContext context, WidgetRef ref) {
    return Container();
  }
}
`;
}

export function pageTemplate(n: NameForms): string {
  return `import 'package:flutter/material.dart';
import 'package:flutter_riverpod/flutter_riverpod.dart';

final ${n.identifier}LoadingProvider = StateProvider<bool>((ref) => false);

class ${n.pascal}Page extends ConsumerWidget {
  const ${n.pascal}Page({super.key});

  @override
  Widget build(BuildContext context, WidgetRef ref) {
    final isLoading = ref.watch(${n.identifier}LoadingProvider);

    return Scaffold(
      appBar: AppBar(
        title: const Text('${n.pascal}'),
      ),
      body: Center(
        child: isLoading
            ? const CircularProgressIndicator()
            : const Text('${n.pascal}'),
      ),
    );
  }
}
`;
}

export function providerTemplate(n: NameForms): string {
  return `import 'package:flutter_riverpod/flutter_riverpod.dart';

final ${n.identifier}Provider = StateProvider<bool>((ref) => false);

class ${n.pascal}State {
  static void update(WidgetRef ref, bool value) {
    ref.read(${n.identifier}Provider.notifier).state = value;
  }
}
`;
}
