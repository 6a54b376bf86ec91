#!/usr/bin/env node
/**
 * SessionStart hook entry - invoked by Claude Code when a session starts.
 *
 * Register in settings.json:
 *   "hooks": {"SessionStart": [{"hooks": [
 *     {"type": "command", "command": "skills-session-start"}
 *   ]}]}
 */

import {readSkillsConfig} from '../../infra/config/skillsConfig';
import {runSessionStartHook} from '../../harnesses/claude/hooks/sessionStart';

process.exitCode = runSessionStartHook(readSkillsConfig());
