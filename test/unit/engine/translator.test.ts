/**
 * @module test/unit/engine/translator.test
 *
 * 翻译引擎单元测试：覆盖每条规则的输出、哨兵结果与合成错误。
 */

import { describe, it, afterEach } from 'node:test';
import assert from 'node:assert/strict';

import {
  Translator,
  translate,
  translateDetailed,
  UNRECOGNIZED_MARKER,
  EMPTY_INSTRUCTION_MARKER,
} from '../../../src/engine/translator.js';
import { createRuleTable, DEFAULT_RULE_DEFINITIONS } from '../../../src/rules/rule-table.js';
import { DiagnosticCode, SynthesisError } from '../../../src/diagnostics/diagnostics.js';
import { ConfigService } from '../../../src/config/config-service.js';
import { captureOutput } from '../../helpers/console-capture.js';

describe('translate', () => {
  describe('打印', () => {
    it('自由文本始终输出为字符串字面量', () => {
      assert.equal(translate('print hello world'), 'print("hello world")');
    });

    it('自由文本中的双引号与反斜杠被转义', () => {
      assert.equal(translate('print say "hi" \\o/'), 'print("say \\"hi\\" \\\\o/")');
    });

    it('print list 命中专用规则而不是自由文本打印', () => {
      assert.equal(translate('print list'), 'print(my_list)');
      assert.equal(translateDetailed('print list').kind, 'code');
    });

    it('print string 与 print dictionary 命中专用规则', () => {
      assert.equal(translate('print string'), 'print(my_string)');
      assert.equal(translate('print dictionary'), 'print(my_dict)');
    });

    it('整串匹配：带后缀的 print list 落到自由文本规则', () => {
      assert.deepEqual(translateDetailed('print list now'), {
        kind: 'code',
        ruleId: 'print-text',
        code: 'print("list now")',
      });
    });
  });

  describe('数字区间', () => {
    it('上界包含在内：1 到 5 生成 range(1, 6)', () => {
      assert.equal(translate('print numbers from 1 to 5'), 'for i in range(1, 6):\n    print(i)');
    });

    it('去除前导零', () => {
      assert.equal(translate('print numbers from 007 to 10'), 'for i in range(7, 11):\n    print(i)');
    });

    it('大整数不丢精度', () => {
      assert.equal(
        translate('print numbers from 1 to 99999999999999999999'),
        'for i in range(1, 100000000000000000000):\n    print(i)'
      );
    });
  });

  describe('算术', () => {
    it('四种运算映射到 Python 运算符', () => {
      assert.equal(translate('add 10 and 20'), 'print(10 + 20)');
      assert.equal(translate('subtract 10 and 3'), 'print(10 - 3)');
      assert.equal(translate('multiply 4 and 6'), 'print(4 * 6)');
      assert.equal(translate('divide 9 and 3'), 'print(9 / 3)');
    });

    it('非整数操作数不匹配任何规则', () => {
      assert.equal(translate('add ten and 20'), UNRECOGNIZED_MARKER);
    });
  });

  describe('列表', () => {
    it('逐项推断数值与字符串，保持顺序', () => {
      assert.equal(translate('create list 1,2,apple'), 'my_list = [1, 2, "apple"]');
    });

    it('不去重，去除各项首尾空白', () => {
      assert.equal(translate('create list 1, 1, -3, 04, a b'), 'my_list = [1, 1, -3, 4, "a b"]');
    });

    it('追加按同样的规则推断', () => {
      assert.equal(translate('append 6 to list'), 'my_list.append(6)');
      assert.equal(translate('append hello to list'), 'my_list.append("hello")');
    });

    it('排序与遍历为固定输出', () => {
      assert.equal(translate('sort list'), 'my_list.sort()');
      assert.equal(translate('loop list'), 'for item in my_list:\n    print(item)');
    });
  });

  describe('字符串', () => {
    it('创建、转大写', () => {
      assert.equal(translate('create string hello python'), 'my_string = "hello python"');
      assert.equal(translate('uppercase string'), 'my_string = my_string.upper()');
    });

    it('平方', () => {
      assert.equal(translate('square 5'), 'print(5 ** 2)');
    });

    it('输入提示被规范化为小写', () => {
      assert.equal(translate('ask input Enter your name:'), 'user_input = input("enter your name:")');
    });
  });

  describe('字典', () => {
    it('键始终加引号，值按类型推断', () => {
      assert.equal(
        translate('create dictionary name:john, age:25'),
        'my_dict = {"name": "john", "age": 25}'
      );
    });

    it('缺少冒号时抛出 SynthesisError 并定位到出错的条目', () => {
      assert.throws(
        () => translate('create dictionary name'),
        (error: unknown) => {
          assert.ok(error instanceof SynthesisError);
          assert.equal(error.ruleId, 'create-dictionary');
          assert.equal(error.diagnostic.code, DiagnosticCode.N001_MalformedPair);
          assert.equal(error.diagnostic.message, "Expected exactly one ':' in dictionary pair 'name'");
          assert.deepEqual(error.diagnostic.span, { start: { line: 1, col: 19 }, end: { line: 1, col: 23 } });
          return true;
        }
      );
    });

    it('第二个条目出错时列号指向该条目', () => {
      assert.throws(
        () => translate('create dictionary a:1, b'),
        (error: unknown) => {
          assert.ok(error instanceof SynthesisError);
          assert.equal(error.diagnostic.message, "Expected exactly one ':' in dictionary pair 'b'");
          assert.equal(error.diagnostic.span.start.col, 24);
          return true;
        }
      );
    });

    it('多于一个冒号同样是错误', () => {
      assert.throws(() => translate('create dictionary a:b:c'), SynthesisError);
    });

    it('空键报告 N002', () => {
      assert.throws(
        () => translate('create dictionary :5'),
        (error: unknown) => error instanceof SynthesisError && error.diagnostic.code === DiagnosticCode.N002_EmptyKey
      );
    });
  });

  describe('条件', () => {
    it('按值相等比较，消息加引号', () => {
      assert.equal(translate('if x equals 10 then print correct'), 'if x == 10: print("correct")');
    });

    it('纯数字操作数去除前导零', () => {
      assert.equal(translate('if 007 equals 1 then print x'), 'if 7 == 1: print("x")');
    });

    it('接受非 ASCII 字母与下划线开头的变量名', () => {
      assert.equal(translate('if café equals 1 then print x'), 'if café == 1: print("x")');
      assert.equal(translate('if _tmp2 equals 3 then print ok'), 'if _tmp2 == 3: print("ok")');
    });

    it('数字开头的非纯数字变量名报告 N003 并指向变量列', () => {
      assert.throws(
        () => translate('if 1abc equals 1 then print x'),
        (error: unknown) =>
          error instanceof SynthesisError &&
          error.ruleId === 'conditional' &&
          error.diagnostic.code === DiagnosticCode.N003_InvalidVariable &&
          error.diagnostic.span.start.col === 4 &&
          error.diagnostic.span.end.col === 8
      );
    });

    it('Python 关键字不能作为变量名', () => {
      assert.throws(
        () => translate('if while equals 1 then print x'),
        (error: unknown) => error instanceof SynthesisError && error.diagnostic.code === DiagnosticCode.N003_InvalidVariable
      );
    });
  });

  describe('帮助', () => {
    it('从目录渲染完整的命令清单', () => {
      const lines = translate('help').split('\n');
      assert.equal(lines[0], '# Available commands:');
      assert.equal(lines[1], '# print numbers from X to Y - Print range of numbers');
      assert.equal(lines[5], '# print [text] - Print any text');
      assert.equal(lines[lines.length - 1], '# help - Show this message');
      assert.equal(lines.length, DEFAULT_RULE_DEFINITIONS.length + 1);
    });

    it('show commands 是 help 的别名', () => {
      assert.equal(translate('show commands'), translate('help'));
    });
  });

  describe('哨兵结果', () => {
    it('无法识别的指令返回哨兵文本而不抛异常', () => {
      assert.equal(translate('do a backflip'), UNRECOGNIZED_MARKER);
      assert.deepEqual(translateDetailed('do a backflip'), { kind: 'unrecognized', code: UNRECOGNIZED_MARKER });
    });

    it('空指令不查询规则表', () => {
      assert.deepEqual(translateDetailed('   \t '), { kind: 'empty', code: EMPTY_INSTRUCTION_MARKER });
      assert.equal(translate(''), '# Please enter an instruction');
    });

    it('缺少参数的模板不匹配', () => {
      assert.equal(translate('print'), UNRECOGNIZED_MARKER);
      assert.equal(translate('create list'), UNRECOGNIZED_MARKER);
    });
  });

  it('大小写与首尾空白不影响结果', () => {
    assert.equal(translate('  PRINT List  '), 'print(my_list)');
  });
});

describe('Translator', () => {
  it('规则顺序决定优先级：自由文本打印前置时会遮蔽 print list', () => {
    const printText = DEFAULT_RULE_DEFINITIONS.find(def => def.id === 'print-text');
    assert.ok(printText);
    const reordered = createRuleTable([printText, ...DEFAULT_RULE_DEFINITIONS.filter(def => def !== printText)]);
    const translator = new Translator(reordered);

    assert.equal(translator.translate('print list'), 'print("list")');
  });

  it('自定义规则表的帮助只列出该表的规则', () => {
    const subset = DEFAULT_RULE_DEFINITIONS.filter(def => def.id === 'print-text' || def.id === 'help');
    const translator = new Translator(createRuleTable(subset));

    assert.equal(
      translator.translate('help'),
      '# Available commands:\n# print [text] - Print any text\n# help - Show this message'
    );
    assert.equal(translator.translate('sort list'), UNRECOGNIZED_MARKER);
  });
});

describe('规则追踪日志', { concurrency: false }, () => {
  const originalTrace = process.env.NLCODE_TRACE;
  const originalLogLevel = process.env.LOG_LEVEL;

  afterEach(() => {
    for (const [key, value] of [
      ['NLCODE_TRACE', originalTrace],
      ['LOG_LEVEL', originalLogLevel],
    ] as const) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    ConfigService.resetForTesting();
  });

  it('默认实例创建后开启 NLCODE_TRACE 仍然生效', async () => {
    process.env.LOG_LEVEL = 'INFO';
    delete process.env.NLCODE_TRACE;
    ConfigService.resetForTesting();

    const quiet = await captureOutput(() => translate('print list'));
    assert.deepEqual(quiet.output.error, []);

    process.env.NLCODE_TRACE = '1';
    ConfigService.resetForTesting();

    const traced = await captureOutput(() => translate('print list'));
    assert.equal(traced.result, 'print(my_list)');
    assert.equal(traced.output.error.length, 1);
    assert.ok(traced.output.error[0]?.includes('"message":"rule matched"'));
    assert.ok(traced.output.error[0]?.includes('"ruleId":"print-list"'));
  });
});
