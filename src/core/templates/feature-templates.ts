/**
 * Dart file bodies for a clean-architecture feature module.
 */
import type { NameForms } from '../naming/names.js';

export function entityTemplate(n: NameForms): string {
  return `import 'package:equatable/equatable.dart';

class ${n.pascal}Entity extends Equatable {
  final int id;
  final String name;
  final String? description;

  const ${n.pascal}Entity({
    required this.id,
    required this.name,
    this.description,
  });

  @override
  List<Object?> get props => [id, name, description];
}
`;
}

export function modelTemplate(n: NameForms): string {
  return `import 'package:equatable/equatable.dart';
import '../../domain/entities/${n.snake}_entity.dart';

class ${n.pascal}Model extends Equatable {
  final int id;
  final String name;
  final String? description;

  const ${n.pascal}Model({
    required this.id,
    required this.name,
    this.description,
  });

  factory ${n.pascal}Model.fromJson(Map<String, dynamic> json) {
    return ${n.pascal}Model(
      id: json['id'] as int,
      name: json['name'] as String,
      description: json['description'] as String?,
    );
  }

  Map<String, dynamic> toJson() {
    return {
      'id': id,
      'name': name,
      'description': description,
    };
  }

  ${n.pascal}Entity toEntity() {
    return ${n.pascal}Entity(
      id: id,
      name: name,
      description: description,
    );
  }

  @override
  List<Object?> get props => [id, name, description];
}
`;
}

export function repositoryTemplate(n: NameForms): string {
  return `import 'package:dartz/dartz.dart';
import '../../../../core/error/failures.dart';
import '../entities/${n.snake}_entity.dart';

abstract class ${n.pascal}Repository {
  Future<Either<Failure, List<${n.pascal}Entity>>> get${n.pascal}s();
  Future<Either<Failure, ${n.pascal}Entity>> get${n.pascal}ById(int id);
}
`;
}

export function repositoryImplTemplate(n: NameForms): string {
  return `import 'package:dartz/dartz.dart';
import 'package:dio/dio.dart';
import '../../../../core/error/failures.dart';
import '../../domain/entities/${n.snake}_entity.dart';
import '../../domain/repositories/${n.snake}_repository.dart';
import '../models/${n.snake}_model.dart';

class ${n.pascal}RepositoryImpl implements ${n.pascal}Repository {
  final Dio _dio;

  ${n.pascal}RepositoryImpl(this._dio);

  @override
  Future<Either<Failure, List<${n.pascal}Entity>>> get${n.pascal}s() async {
    try {
      final response = await _dio.get('/${n.snake}s');
      final List<dynamic> data = response.data;
      final models = data.map((json) => ${n.pascal}Model.fromJson(json)).toList();
      return Right(models.map((model) => model.toEntity()).toList());
    } catch (e) {
      return Left(ServerFailure(e.toString()));
    }
  }

  @override
  Future<Either<Failure, ${n.pascal}Entity>> get${n.pascal}ById(int id) async {
    try {
      final response = await _dio.get('/${n.snake}s/$id');
      return Right(${n.pascal}Model.fromJson(response.data).toEntity());
    } catch (e) {
      return Left(ServerFailure(e.toString()));
    }
  }
}
`;
}

export function useCaseTemplate(n: NameForms): string {
  return `import 'package:dartz/dartz.dart';
import '../../../../core/error/failures.dart';
import '../entities/${n.snake}_entity.dart';
import '../repositories/${n.snake}_repository.dart';

class Get${n.pascal}sUseCase {
  final ${n.pascal}Repository _repository;

  Get${n.pascal}sUseCase(this._repository);

  Future<Either<Failure, List<${n.pascal}Entity>>> call() async {
    return await _repository.get${n.pascal}s();
  }
}
`;
}

export function featureProviderTemplate(n: NameForms): string {
  return `import 'package:flutter_riverpod/flutter_riverpod.dart';
import '../../../../core/network/dio_client.dart';
import '../../data/repositories/${n.snake}_repository_impl.dart';
import '../../domain/usecases/get_${n.snake}s_usecase.dart';

final ${n.identifier}RepositoryProvider = Provider((ref) {
  return ${n.pascal}RepositoryImpl(DioClient.instance);
});

final get${n.pascal}sUseCaseProvider = Provider((ref) {
  final repository = ref.watch(${n.identifier}RepositoryProvider);
  return Get${n.pascal}sUseCase(repository);
});
`;
}

export function featurePageTemplate(n: NameForms): string {
  return `import 'package:flutter/material.dart';
import 'package:flutter_riverpod/flutter_riverpod.dart';

class ${n.pascal}Page extends ConsumerWidget {
  const ${n.pascal}Page({super.key});

  @override
  Widget build(BuildContext context, WidgetRef ref) {
    return Scaffold(
      appBar: AppBar(
        title: const Text('${n.pascal}s'),
      ),
      body: const Center(
        child: Text('${n.pascal} Page'),
      ),
    );
  }
}
`;
}
