import { Box, Static } from 'ink'
import React from 'react'
import type { Message } from '@app/query'
import { ChatMessage } from './messages/ChatMessage'

type BannerItem = { type: 'banner'; uuid: 'banner' }

const BANNER_ITEM: BannerItem = { type: 'banner', uuid: 'banner' }

type Props = {
  banner: React.ReactNode
  messages: Message[]
}

export function MessageList({ banner, messages }: Props): React.ReactNode {
  const items: (BannerItem | Message)[] = [BANNER_ITEM, ...messages]
  return (
    <Static items={items}>
      {item =>
        item.type === 'banner' ? (
          <Box key={item.uuid}>{banner}</Box>
        ) : (
          <ChatMessage key={item.uuid} message={item} />
        )
      }
    </Static>
  )
}
