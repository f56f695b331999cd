import Joi from 'joi';
import { Configuration, RequiredTool } from './types';

export const SUPPORTED_DISTRIBUTIONS = ['humble', 'iron', 'jazzy', 'rolling'] as const;

export const MANIFEST_BASE_URL = 'https://raw.githubusercontent.com/ros2/ros2';
export const MANIFEST_FILE = 'ros2.repos';
export const DEFAULT_TARGET_DIR = 'ros2_ws';
export const SOURCE_DIR = 'src';
export const PACKAGE_MANIFEST = 'package.xml';
export const BUILD_ARTIFACT_DIRS = ['build', 'install', 'log'] as const;

export const VCS_COMMAND = 'vcs';
export const COLCON_COMMAND = 'colcon';

export const CLONE_REQUIREMENTS: RequiredTool[] = [
  { command: VCS_COMMAND, displayName: 'vcstool', installHint: 'pip install vcstool' },
  { command: 'git', displayName: 'git' }
];

export const BUILD_REQUIREMENTS: RequiredTool[] = [
  { command: COLCON_COMMAND, displayName: 'colcon', installHint: 'pip install colcon-common-extensions' }
];

export const EXIT_CODES = {
  success: 0,
  unexpected: 1,
  usage: 2,
  prerequisite: 3,
  manifestUnreachable: 4,
  importFailure: 5,
  workspace: 6,
  buildFailure: 7,
  interrupted: 130
} as const;

export const configurationSchema = Joi.object<Configuration>({
  distribution: Joi.string().allow('').default(''),
  releaseTag: Joi.string().allow('').optional(),
  targetDirectory: Joi.string().default(DEFAULT_TARGET_DIR),
  cleanBeforeClone: Joi.boolean().default(false)
}).required();
