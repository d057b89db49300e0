import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import { BuildConfig, BuildConfigInput, createBuildConfig } from '../../src/config/build-config';
import { PipelineError } from '../../src/domain/errors';
import { TargetLanguage } from '../../src/domain/language';
import { listFiles } from '../../src/postprocess/relocate';
import { ProcessRequest } from '../../src/toolchain/process-runner';
import { ScriptedRunner } from './scripted-runner';

export const GREETER_PROTO = `syntax = "proto3";

package api.v1;

service Greeter {
  rpc SayHello (HelloRequest) returns (HelloReply) {}
}

message HelloRequest {
  string name = 1;
}

message HelloReply {
  string message = 1;
}
`;

/** Raw grpc_tools.protoc output for api/v1/helloworld.proto. */
export const PYTHON_GREETER_OUTPUT: Record<string, string> = {
  'api/v1/helloworld_pb2.py': [
    'from google.protobuf import descriptor as _descriptor',
    'from google.protobuf.internal import builder as _builder',
    '',
    "DESCRIPTOR = _descriptor.FileDescriptor(name='api/v1/helloworld.proto')",
    '',
  ].join('\n'),
  'api/v1/helloworld_pb2.pyi': [
    'from google.protobuf import message as _message',
    '',
    'class HelloRequest(_message.Message): ...',
    'class HelloReply(_message.Message): ...',
    '',
  ].join('\n'),
  'api/v1/helloworld_pb2_grpc.py': [
    'import grpc',
    '',
    'from api.v1 import helloworld_pb2 as api_dot_v1_dot_helloworld__pb2',
    '',
    'class GreeterStub(object):',
    '    pass',
    '',
  ].join('\n'),
};

export const PYTHON_WHEEL = 'protos_python-0.1.0-py3-none-any.whl';
export const WHEEL_CONTENT = 'wheel-bytes';

export async function makeProject(protos: Record<string, string> = { 'api/v1/helloworld.proto': GREETER_PROTO }): Promise<string> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'protopack-'));
  for (const [file, content] of Object.entries(protos)) {
    await fs.outputFile(path.join(root, 'proto', file), content);
  }
  return root;
}

export async function removeProject(root: string): Promise<void> {
  await fs.remove(root);
}

export function testConfig(
  root: string,
  language: TargetLanguage,
  overrides: Partial<BuildConfigInput> = {},
): BuildConfig {
  return createBuildConfig({ language, projectRoot: root, containerStartupDelayMs: 0, ...overrides });
}

/** Write files the way a generator would, under generated/code/<language>. */
export function writeGenerated(root: string, language: TargetLanguage, files: Record<string, string>): void {
  for (const [file, content] of Object.entries(files)) {
    fs.outputFileSync(path.join(root, 'generated', 'code', language, file), content);
  }
}

/** Write a build output into <cwd>/dist. */
export function writeDist(request: ProcessRequest, fileName: string, content: string): void {
  fs.outputFileSync(path.join(request.cwd ?? '.', 'dist', fileName), content);
}

/** Runner scripted for a successful python pipeline of the Greeter project. */
export function pythonRunner(root: string): ScriptedRunner {
  return new ScriptedRunner()
    .on('grpc_tools.protoc', () => writeGenerated(root, 'python', PYTHON_GREETER_OUTPUT))
    .on('uv build', (request) => writeDist(request, PYTHON_WHEEL, WHEEL_CONTENT));
}

/** Every file under dir with its content, keyed by POSIX relative path. */
export async function snapshotTree(dir: string): Promise<Record<string, string>> {
  const result: Record<string, string> = {};
  for (const file of await listFiles(dir)) {
    result[file] = await fs.readFile(path.join(dir, file), 'utf-8');
  }
  return result;
}

/** Await a promise that must reject with a PipelineError and return it. */
export async function rejection(promise: Promise<unknown>): Promise<PipelineError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof PipelineError) return err;
    throw err;
  }
  throw new Error('expected the promise to reject');
}
