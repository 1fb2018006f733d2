import assert from 'node:assert/strict';
import path from 'node:path';
import { test } from 'node:test';
import {
  CMAKE_UTIL_DESCRIPTOR,
  ConfInfo,
  USER_TOOLCHAIN_CONF,
  createRecipeLogger,
  planPublishList,
  publishManifest,
  reportPackageInfo
} from '../src';
import { captureLogs } from './helpers';

test('ConfInfo appends values in order per name', () => {
  const conf = new ConfInfo();
  conf.append('tools.build:flags', '-Og');
  conf.append(USER_TOOLCHAIN_CONF, '/a.cmake');
  conf.append(USER_TOOLCHAIN_CONF, '/b.cmake');

  assert.deepEqual(conf.get(USER_TOOLCHAIN_CONF), ['/a.cmake', '/b.cmake']);
  assert.deepEqual(conf.get('missing'), []);
  assert.deepEqual(conf.names(), ['tools.build:flags', USER_TOOLCHAIN_CONF]);
  assert.deepEqual(conf.toJSON(), {
    'tools.build:flags': ['-Og'],
    [USER_TOOLCHAIN_CONF]: ['/a.cmake', '/b.cmake']
  });
});

test('publishManifest appends fragments after existing toolchain entries', () => {
  const conf = new ConfInfo();
  conf.append(USER_TOOLCHAIN_CONF, '/existing/toolchain.cmake');
  const list = planPublishList('/pkg', CMAKE_UTIL_DESCRIPTOR.resolveOptions({ optimize_debug_build: false }));

  publishManifest(list, conf);

  assert.deepEqual(conf.get(USER_TOOLCHAIN_CONF), [
    '/existing/toolchain.cmake',
    path.resolve('/pkg', 'cmake/build_outputs.cmake'),
    path.resolve('/pkg', 'cmake/colors.cmake'),
    path.resolve('/pkg', 'cmake/build.cmake')
  ]);
});

test('reportPackageInfo logs the clang-tidy path and option values', () => {
  const { destination, records } = captureLogs();
  const logger = createRecipeLogger({ destination });
  const options = CMAKE_UTIL_DESCRIPTOR.resolveOptions({ add_build_outputs: false });

  const lines = reportPackageInfo(logger, '/pkg', options);

  const expected = [
    `clang_tidy_config_path: ${path.resolve('/pkg', 'cmake/clang-tidy.conf')}`,
    'add_build_outputs: false',
    'optimize_debug_build: true'
  ];
  assert.deepEqual(lines, expected);
  assert.deepEqual(
    records.map((record) => record.msg),
    expected
  );
  assert.ok(records.every((record) => record.level === 30));
});
