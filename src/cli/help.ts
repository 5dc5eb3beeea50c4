export const formatHelp = () => `
fs-entry

Usage:
  fs-entry <command> [arguments] [options]

  If no command is specified and running in TTY, you'll be prompted to choose.

Commands:
  info <path>                    - Show type, size, permissions and MIME type as JSON
  ls <path>                      - List directory entries, one name per line
  touch <path>                   - Create an empty file
  mkdir <path>                   - Create a directory
  mv <source> <destination>      - Move a file or directory
  rename <path> <name>           - Rename within the same directory
  rm <path>                      - Remove a file
  rmdir <path>                   - Remove a directory
  cat <path>                     - Print file content
  append <path> <content>        - Append content to a file
  write <path> <content>         - Replace the content of a file

Options:
  --recursive, -r    ls: descend into subdirectories; rmdir: remove contents too
  --all, -a          ls: include entries starting with "."
  --dirs             ls: directories only
  --files            ls: regular files only
  --force, -f        touch: truncate an existing file; mv/rename: replace the destination
  --parents, -p      mkdir: create missing parent directories
  --mode, -m <mode>  mkdir: octal permissions (default: FS_ENTRY_DIR_MODE or 775)

Environment:
  LOG_LEVEL            fatal|error|warn|info|debug|trace|silent (default: info)
  NODE_ENV             production switches logs to JSON
  FS_ENTRY_DIR_MODE    default mkdir permissions

Examples:
  fs-entry                           # Interactive mode - choose operation
  fs-entry ls ~/projects -r --dirs
  fs-entry mkdir build/out -p -m 750
  fs-entry mv notes.txt archive/notes.txt --force
`;
