import os from 'os';
import path from 'path';

export const TEST_ROOT = path.join(os.tmpdir(), 'super-patch-tests');

/** 示例行为类：一个双参数调用，一个单参数调用 */
export const SAMPLE_BEHAVIOR = [
  'package example.behavior;',
  '',
  'public class PounceBehavior extends SteeringBehavior {',
  '    public PounceBehavior() {',
  '        super(1.0, false);',
  '    }',
  '',
  '    public PounceBehavior(double range) {',
  '        super(3.25);',
  '        this.range = range;',
  '    }',
  '}',
  '',
].join('\n');

export const SAMPLE_BEHAVIOR_FIXED = [
  'package example.behavior;',
  '',
  'public class PounceBehavior extends SteeringBehavior {',
  '    public PounceBehavior() {',
  '        super();',
  '        setWeight(1.0);',
  '        setEnabled(false);',
  '    }',
  '',
  '    public PounceBehavior(double range) {',
  '        super();',
  '        setWeight(3.25);',
  '        this.range = range;',
  '    }',
  '}',
  '',
].join('\n');

export const UNTOUCHED_BEHAVIOR = [
  'public class PurrBehavior extends SteeringBehavior {',
  '    public PurrBehavior(double weight) {',
  '        super(weight);',
  '    }',
  '',
  '    public PurrBehavior() {',
  '        super();',
  '        setWeight(0.5);',
  '    }',
  '}',
  '',
].join('\n');
