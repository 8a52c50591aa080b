import type { MsvcRuntime, TargetPlatform } from "@anvil/core"

export interface BuildEnvOptions {
	platform: TargetPlatform
	msvcRuntime: MsvcRuntime
	forcePic: boolean
	base?: NodeJS.ProcessEnv
}

const CMAKE_RUNTIME: Record<MsvcRuntime, string> = {
	MD: "MultiThreadedDLL",
	MT: "MultiThreaded",
}

const CMAKE_RUNTIME_FLAG = /-DCMAKE_MSVC_RUNTIME_LIBRARY=\S+/

/**
 * Environment for build commands. On Windows every compiler invocation gets
 * the same C runtime; on POSIX `forcePic` adds -fPIC to the C and C++ flags.
 */
export function buildEnvironment(options: BuildEnvOptions): NodeJS.ProcessEnv {
	const env: NodeJS.ProcessEnv = { ...(options.base ?? process.env) }

	if (options.platform === "windows") {
		const flag = `/${options.msvcRuntime}`
		const cl = env.CL ?? ""
		env.CL = /\/M[DT]\b/.test(cl) ? cl.replace(/\/M[DT]\b/g, flag) : `${flag} ${cl}`.trim()
		env.CMAKE_MSVC_RUNTIME_LIBRARY = CMAKE_RUNTIME[options.msvcRuntime]
		return env
	}

	if (options.forcePic) {
		env.CFLAGS = withFlag(env.CFLAGS, "-fPIC")
		env.CXXFLAGS = withFlag(env.CXXFLAGS, "-fPIC")
	}
	return env
}

/**
 * Pin the MSVC runtime on a cmake configure command, replacing any runtime
 * the command already names. Other commands are returned unchanged.
 */
export function applyMsvcRuntime(command: string, runtime: MsvcRuntime): string {
	if (!/^\s*cmake\s/.test(command) || /\s--(build|install)\b/.test(command)) {
		return command
	}
	const flag = `-DCMAKE_MSVC_RUNTIME_LIBRARY=${CMAKE_RUNTIME[runtime]}`
	return CMAKE_RUNTIME_FLAG.test(command)
		? command.replace(CMAKE_RUNTIME_FLAG, flag)
		: `${command} ${flag}`
}

function withFlag(current: string | undefined, flag: string): string {
	const value = current ?? ""
	return value.split(/\s+/).includes(flag) ? value : `${value} ${flag}`.trim()
}
