const RUNTIME_MISMATCH = /value '([A-Z]+)_[^']*' doesn't match value '([A-Z]+)_[^']*'/

/**
 * Suggestions for link failures that a build setting fixes: MSVC runtime
 * mismatches (LNK2038) and relocations that need position-independent code.
 */
export function diagnoseLinkErrors(output: string): string[] {
	const suggestions: string[] = []

	if (output.includes("LNK2038") && output.includes("RuntimeLibrary")) {
		const match = RUNTIME_MISMATCH.exec(output)
		suggestions.push(
			match
				? `MSVC runtime mismatch between ${match[1]} and ${match[2]}; build every component with the same C runtime.`
				: "MSVC runtime mismatch (LNK2038); build every component with the same /MD or /MT option.",
			"Set ANVIL_MSVC_RUNTIME=MD (dynamic CRT) or ANVIL_MSVC_RUNTIME=MT (static CRT), or pass --msvc-runtime.",
			'Add "msvc_runtime": "MD" or "MT" to the project\'s anvil.json.',
			"For CMake projects, pass -DCMAKE_MSVC_RUNTIME_LIBRARY=MultiThreadedDLL or MultiThreaded.",
		)
	}

	if (output.includes("recompile with -fPIC") || (output.includes("relocation") && output.includes("R_X86_64"))) {
		suggestions.push(
			"Relocation errors at link time: the objects need to be built with -fPIC.",
			"Set ANVIL_FORCE_PIC=1 or pass --force-pic to add -fPIC to CFLAGS and CXXFLAGS.",
			'Add "force_pic": true to the project\'s anvil.json.',
		)
	}

	return suggestions
}
