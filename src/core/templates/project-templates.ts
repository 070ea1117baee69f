/**
 * Boilerplate written into a freshly created Flutter project.
 */

/** Indented block added under `dependencies:` in pubspec.yaml. */
export const PUBSPEC_DEPENDENCIES = `  # State Management
  flutter_riverpod: ^2.4.9
  riverpod_annotation: ^2.3.3

  # Navigation
  go_router: ^12.1.3

  # HTTP Client
  dio: ^5.9.0
  curl_logger_dio_interceptor: ^1.0.0

  # Local Storage
  shared_preferences: ^2.2.2

  # Functional Programming
  dartz: ^0.10.1

  # Utilities
  equatable: ^2.0.5
  logger: ^2.0.2+1
`;

/** Directories created under lib/. */
export const PROJECT_DIRECTORIES = [
  'core/constants',
  'core/network/interceptors',
  'core/storage',
  'core/router',
  'core/error',
  'features/auth/presentation/pages',
  'features/home/presentation/pages',
  'shared/widgets',
  'shared/providers',
  'shared/functions',
  'shared/enums',
  'shared/validators',
] as const;

export const DIO_CLIENT_TEMPLATE = `import 'package:dio/dio.dart';
import 'interceptors/auth_interceptor.dart';
import 'interceptors/logging_interceptor.dart';

class DioClient {
  static final Dio _dio = Dio(
    BaseOptions(
      baseUrl: 'https://api.example.com',
      connectTimeout: const Duration(seconds: 10),
      receiveTimeout: const Duration(seconds: 10),
      headers: {
        'Content-Type': 'application/json',
        'Accept': 'application/json',
      },
    ),
  )..interceptors.addAll([
    LoggingInterceptor(),
    AuthInterceptor(),
  ]);

  static Dio get instance => _dio;
}
`;

export const AUTH_INTERCEPTOR_TEMPLATE = `import 'package:dio/dio.dart';
import '../../storage/token_manager.dart';

class AuthInterceptor extends Interceptor {
  @override
  void onRequest(RequestOptions options, RequestInterceptorHandler handler) async {
    final token = await TokenManager.getToken();
    if (token != null) {
      options.headers['Authorization'] = 'Bearer $token';
    }
    handler.next(options);
  }

  @override
  void onError(DioException err, ErrorInterceptorHandler handler) async {
    if (err.response?.statusCode == 401) {
      await TokenManager.clearTokens();
    }
    handler.next(err);
  }
}
`;

export const LOGGING_INTERCEPTOR_TEMPLATE = `import 'package:dio/dio.dart';
import 'package:logger/logger.dart';

class LoggingInterceptor extends Interceptor {
  final Logger _logger = Logger();

  @override
  void onRequest(RequestOptions options, RequestInterceptorHandler handler) {
    _logger.d('REQUEST[\${options.method}] => PATH: \${options.path}');
    handler.next(options);
  }

  @override
  void onResponse(Response response, ResponseInterceptorHandler handler) {
    _logger.d('RESPONSE[\${response.statusCode}] => PATH: \${response.requestOptions.path}');
    handler.next(response);
  }

  @override
  void onError(DioException err, ErrorInterceptorHandler handler) {
    _logger.e('ERROR[\${err.response?.statusCode}] => PATH: \${err.requestOptions.path}');
    handler.next(err);
  }
}
`;

export const TOKEN_MANAGER_TEMPLATE = `import 'package:shared_preferences/shared_preferences.dart';

class TokenManager {
  static const String _tokenKey = 'auth_token';
  static const String _refreshTokenKey = 'refresh_token';

  static Future<void> saveToken(String token) async {
    final prefs = await SharedPreferences.getInstance();
    await prefs.setString(_tokenKey, token);
  }

  static Future<String?> getToken() async {
    final prefs = await SharedPreferences.getInstance();
    return prefs.getString(_tokenKey);
  }

  static Future<void> clearTokens() async {
    final prefs = await SharedPreferences.getInstance();
    await prefs.remove(_tokenKey);
    await prefs.remove(_refreshTokenKey);
  }
}
`;

export const FAILURES_TEMPLATE = `abstract class Failure {
  final String message;
  const Failure(this.message);
}

class ServerFailure extends Failure {
  const ServerFailure([String message = 'Server error occurred']) : super(message);
}

class NetworkFailure extends Failure {
  const NetworkFailure([String message = 'Network error occurred']) : super(message);
}

class ValidationFailure extends Failure {
  const ValidationFailure([String message = 'Validation error occurred']) : super(message);
}
`;

/**
 * The route registry. Later `create feature` runs patch this file, so the
 * import block, the Router constants and the routes list must keep their
 * shape. Imports are relative to the registry's directory.
 */
export function appRouterTemplate(loginImport: string, homeImport: string): string {
  return `import 'package:flutter_riverpod/flutter_riverpod.dart';
import 'package:go_router/go_router.dart';
import '${loginImport}';
import '${homeImport}';

class Router {
  static const String login = '/login';
  static const String loginName = 'login';
  static const String home = '/home';
  static const String homeName = 'home';
}

final routerProvider = Provider<GoRouter>((ref) {
  return GoRouter(
    initialLocation: Router.login,
    routes: [
      GoRoute(
        path: Router.login,
        name: Router.loginName,
        builder: (context, state) => const LoginPage(),
      ),
      GoRoute(
        path: Router.home,
        name: Router.homeName,
        builder: (context, state) => const HomePage(),
      ),
    ],
  );
});
`;
}

export function mainTemplate(routerImport: string): string {
  return `import 'package:flutter/material.dart';
import 'package:flutter_riverpod/flutter_riverpod.dart';
import '${routerImport}';

void main() {
  runApp(
    const ProviderScope(
      child: MyApp(),
    ),
  );
}

class MyApp extends ConsumerWidget {
  const MyApp({super.key});

  @override
  Widget build(BuildContext context, WidgetRef ref) {
    final router = ref.watch(routerProvider);

    return MaterialApp.router(
      title: 'Flutter Demo',
      routerConfig: router,
    );
  }
}
`;
}

export function examplePageTemplate(className: string, title: string): string {
  return `import 'package:flutter/material.dart';
import 'package:flutter_riverpod/flutter_riverpod.dart';

class ${className} extends ConsumerWidget {
  const ${className}({super.key});

  @override
  Widget build(BuildContext context, WidgetRef ref) {
    return Scaffold(
      appBar: AppBar(
        title: const Text('${title}'),
      ),
      body: const Center(
        child: Text('${title} Page'),
      ),
    );
  }
}
`;
}
