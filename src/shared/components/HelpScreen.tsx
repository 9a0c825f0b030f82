import React from 'react'
import { Box, Text, useInput } from 'ink'

interface HelpScreenProps {
  onClose: () => void
}

export const HelpScreen = ({ onClose }: HelpScreenProps) => {
  useInput((input, key) => {
    if (key.escape || input === 'q' || input === '?' || input === 'b') {
      onClose()
    }
  })

  return (
    <Box flexDirection="column" padding={1}>
      <Text bold color="cyan">expense-report - Keyboard Shortcuts</Text>

      <Box marginTop={1} flexDirection="column">
        <Text bold>Categories</Text>
        <Box flexDirection="column" marginLeft={2}>
          <Text><Text color="cyan" bold>j/k</Text> or <Text color="cyan" bold>↑/↓</Text>   Navigate up/down</Text>
          <Text><Text color="cyan" bold>G</Text>           Jump to last category</Text>
          <Text><Text color="cyan" bold>gg</Text>          Jump to first category</Text>
          <Text><Text color="cyan" bold>PgDn/PgUp</Text>   Full page down/up</Text>
          <Text><Text color="cyan" bold>Enter</Text>       Show subcategories</Text>
          <Text><Text color="cyan" bold>/</Text>           Filter by name (Enter keeps, Esc clears)</Text>
          <Text><Text color="cyan" bold>?</Text>           This help</Text>
          <Text><Text color="cyan" bold>q</Text>           Quit</Text>
        </Box>
      </Box>

      <Box marginTop={1} flexDirection="column">
        <Text bold>Category details</Text>
        <Box flexDirection="column" marginLeft={2}>
          <Text><Text color="cyan" bold>j/k</Text>         Navigate subcategories</Text>
          <Text><Text color="cyan" bold>Esc/b</Text>       Back to categories</Text>
        </Box>
      </Box>

      <Box marginTop={1}>
        <Text dimColor>Press Esc, q or ? to close</Text>
      </Box>
    </Box>
  )
}
