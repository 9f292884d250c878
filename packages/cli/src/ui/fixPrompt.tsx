import { Box, Text, render, useInput } from "ink"
import React, { useState } from "react"

interface FixPromptProps {
  prompt: string
  onAnswer: (answer: string) => void
}

const FixPrompt: React.FC<FixPromptProps> = ({ prompt, onAnswer }) => {
  const [answer, setAnswer] = useState<string | null>(null)

  useInput((input, key) => {
    if (answer !== null) return

    // Ctrl+C and Escape end the session the same way `q` does
    const value = key.escape || (key.ctrl && input === "c") ? "q" : input
    setAnswer(value)
    onAnswer(value)
  })

  return (
    <Box>
      <Text>{prompt}</Text>
      {answer !== null && <Text bold>{answer}</Text>}
    </Box>
  )
}

/**
 * Ask for a single key press in answer to `prompt`.
 * @returns The key pressed, with Ctrl+C and Escape reported as "q"
 */
export function askFixDecision(prompt: string): Promise<string> {
  return new Promise((resolve) => {
    let unmount: (() => void) | null = null

    const handleAnswer = (answer: string) => {
      if (unmount) {
        unmount()
      }
      resolve(answer)
    }

    const { unmount: u } = render(<FixPrompt prompt={prompt} onAnswer={handleAnswer} />, {
      exitOnCtrlC: false,
    })
    unmount = u
  })
}
