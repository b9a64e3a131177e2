/**
 * Shell completion scripts embedded for CLI output.
 * Usage: shingle-check --completions bash|zsh|fish
 */

export const BASH_COMPLETION = `#!/bin/bash
# Bash completion for shingle-check
# Install: eval "$(shingle-check --completions bash)" in ~/.bashrc

_shingle_check_completions() {
    local cur prev opts
    COMPREPLY=()
    cur="\${COMP_WORDS[COMP_CWORD]}"
    prev="\${COMP_WORDS[COMP_CWORD-1]}"

    opts="-h -V -d -r -n -t -m -j -o -q -v --help --version --dir --recursive --n-value --threshold --max-results --format --ext --json --out --quiet --verbose --debug --completions"

    case "$prev" in
        --dir|-d)
            COMPREPLY=($(compgen -d -- "$cur"))
            return 0
            ;;
        --out|-o)
            COMPREPLY=($(compgen -f -- "$cur"))
            return 0
            ;;
        --format)
            COMPREPLY=($(compgen -W "plain markdown" -- "$cur"))
            return 0
            ;;
        --completions)
            COMPREPLY=($(compgen -W "bash zsh fish" -- "$cur"))
            return 0
            ;;
        --n-value|-n|--threshold|-t|--max-results|-m|--ext)
            return 0
            ;;
    esac

    if [[ "$cur" == -* ]]; then
        COMPREPLY=($(compgen -W "$opts" -- "$cur"))
        return 0
    fi

    COMPREPLY=($(compgen -d -- "$cur"))
}

complete -F _shingle_check_completions shingle-check
`;

export const ZSH_COMPLETION = `#compdef shingle-check
# Zsh completion for shingle-check
# Install: shingle-check --completions zsh > ~/.zsh/completions/_shingle-check

_shingle-check() {
    _arguments -C \\
        '(-h --help)'{-h,--help}'[Show help]' \\
        '(-V --version)'{-V,--version}'[Show version]' \\
        '(-d --dir)'{-d,--dir}'[Directory to search]:directory:_files -/' \\
        '(-r --recursive)'{-r,--recursive}'[Search subdirectories]' \\
        '(-n --n-value)'{-n,--n-value}'[Words per shingle]:n:' \\
        '(-t --threshold)'{-t,--threshold}'[Minimum similarity (0-1)]:threshold:' \\
        '(-m --max-results)'{-m,--max-results}'[Show at most this many pairs]:count:' \\
        '--format[Source format]:format:(plain markdown)' \\
        '*--ext[Only include files with these extensions]:extension:' \\
        '(-j --json)'{-j,--json}'[Output as JSON]' \\
        '(-o --out)'{-o,--out}'[Write report to file]:output file:_files' \\
        '(-q --quiet)'{-q,--quiet}'[Suppress non-essential output]' \\
        '(-v --verbose)'{-v,--verbose}'[Show progress and timing]' \\
        '--debug[Enable debug output]' \\
        '--completions[Output shell completion script]:shell:(bash zsh fish)' \\
        '1:directory:_files -/'
}

_shingle-check "$@"
`;

export const FISH_COMPLETION = `# Fish completion for shingle-check
# Install: shingle-check --completions fish > ~/.config/fish/completions/shingle-check.fish

complete -c shingle-check -f

complete -c shingle-check -s h -l help -d 'Show help'
complete -c shingle-check -s V -l version -d 'Show version'
complete -c shingle-check -s d -l dir -x -a '(__fish_complete_directories)' -d 'Directory to search'
complete -c shingle-check -s r -l recursive -d 'Search subdirectories'
complete -c shingle-check -s n -l n-value -x -d 'Words per shingle'
complete -c shingle-check -s t -l threshold -x -d 'Minimum similarity (0-1)'
complete -c shingle-check -s m -l max-results -x -d 'Show at most this many pairs'
complete -c shingle-check -l format -x -a 'plain markdown' -d 'Source format'
complete -c shingle-check -l ext -x -d 'Only include files with these extensions'
complete -c shingle-check -s j -l json -d 'Output as JSON'
complete -c shingle-check -s o -l out -r -d 'Write report to file'
complete -c shingle-check -s q -l quiet -d 'Suppress non-essential output'
complete -c shingle-check -s v -l verbose -d 'Show progress and timing'
complete -c shingle-check -l debug -d 'Enable debug output'
complete -c shingle-check -l completions -x -a 'bash zsh fish' -d 'Output shell completion script'

complete -c shingle-check -n 'not string match -q -- "-*" (commandline -ct)' -a '(__fish_complete_directories)' -d 'Directory'
`;

export type ShellType = "bash" | "zsh" | "fish";

export function getCompletion(shell: ShellType): string {
  switch (shell) {
    case "bash":
      return BASH_COMPLETION;
    case "zsh":
      return ZSH_COMPLETION;
    case "fish":
      return FISH_COMPLETION;
  }
}

export function isValidShell(shell: string): shell is ShellType {
  return shell === "bash" || shell === "zsh" || shell === "fish";
}
